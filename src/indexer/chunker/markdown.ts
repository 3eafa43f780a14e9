/**
 * Markdown strategy
 *
 * Uses the marked lexer to find headings (ATX and setext; `#` lines inside
 * code fences are not headings) and builds each section's heading path with
 * a level stack. Sections that fit become one chunk; larger ones are split
 * on blank lines and every sub-chunk repeats the section heading.
 *
 * Overlap is only added between consecutive chunks under the same
 * top-level heading, right after the heading line.
 */

import { marked } from 'marked';

import { countWords, estimateTokens, tokensToWords } from './config.js';
import { packParagraphs, splitParagraphs, trailingOverlap } from './paragraphs.js';
import type { ChunkerConfig, Paragraph, TextChunk } from './types.js';

interface HeadingMark {
  /** Heading line(s) as written, e.g. "## Setup" */
  line: string;
  title: string;
  depth: number;
  start: number;
  end: number;
}

interface Section {
  heading: string;
  headingPath: string[];
  level: number;
  startLine: number;
  paragraphs: Paragraph[];
}

interface DraftChunk {
  heading: string;
  headingPath: string[];
  level: number;
  startLine: number;
  body: Paragraph[];
  overlap: Paragraph[];
}

function lineAt(text: string, offset: number): number {
  return text.slice(0, offset).split('\n').length;
}

/**
 * Locate top-level headings in the source.
 *
 * Every top-level token's raw is matched from a moving cursor, so a
 * heading's text repeated inside an earlier code block is skipped over.
 * A raw the lexer rewrote (leading tabs) is not found and leaves the
 * cursor where it was.
 */
function findHeadings(content: string): HeadingMark[] {
  const headings: HeadingMark[] = [];
  let cursor = 0;

  for (const token of marked.lexer(content)) {
    const at = token.raw ? content.indexOf(token.raw, cursor) : -1;
    if (at === -1) continue;
    cursor = at + token.raw.length;

    if (token.type !== 'heading') continue;
    const depth: unknown = token.depth;
    const title: unknown = token.text;
    if (typeof depth !== 'number' || typeof title !== 'string') continue;

    const line = token.raw.replace(/\n+$/, '');
    headings.push({ line: line.trim(), title: title.trim(), depth, start: at, end: at + line.length });
  }

  return headings;
}

function buildSections(content: string): Section[] {
  const headings = findHeadings(content);
  const sections: Section[] = [];

  const preambleEnd = headings[0]?.start ?? content.length;
  const preamble = splitParagraphs(content.slice(0, preambleEnd), /\n{2,}/, 1);
  if (preamble.length > 0) {
    sections.push({ heading: '', headingPath: [], level: 0, startLine: 1, paragraphs: preamble });
  }

  const stack: Array<{ depth: number; title: string }> = [];
  headings.forEach((heading, i) => {
    // Pop siblings and deeper headings so the stack is the current ancestry
    while (stack.length > 0 && (stack[stack.length - 1]?.depth ?? 0) >= heading.depth) {
      stack.pop();
    }
    stack.push({ depth: heading.depth, title: heading.title });

    const bodyEnd = headings[i + 1]?.start ?? content.length;
    const startLine = lineAt(content, heading.start);
    const headingLines = heading.line.split('\n').length - 1;
    sections.push({
      heading: heading.line,
      headingPath: stack.map((entry) => entry.title),
      level: heading.depth,
      startLine,
      paragraphs: splitParagraphs(
        content.slice(heading.end, bodyEnd),
        /\n{2,}/,
        startLine + headingLines
      ),
    });
  });

  return sections;
}

function splitSection(section: Section, budgetWords: number): DraftChunk[] {
  const headingWords = countWords(section.heading);
  const bodyWords = section.paragraphs.reduce((sum, p) => sum + p.words, 0);

  const fits = headingWords + bodyWords <= budgetWords;
  const groups =
    fits || section.paragraphs.length === 0
      ? [section.paragraphs]
      : packParagraphs(section.paragraphs, Math.max(1, budgetWords - headingWords));

  return groups.map((body, i) => ({
    heading: section.heading,
    headingPath: section.headingPath,
    level: section.level,
    startLine: i === 0 ? section.startLine : (body[0]?.line ?? section.startLine),
    body,
    overlap: [],
  }));
}

function sameTopSection(a: DraftChunk, b: DraftChunk): boolean {
  const top = a.headingPath[0];
  return top !== undefined && top === b.headingPath[0];
}

export function chunkMarkdown(content: string, config: ChunkerConfig): TextChunk[] {
  const { maxTokensPerChunk, overlapTokens, wordsPerToken } = config;
  const budgetWords = tokensToWords(maxTokensPerChunk, wordsPerToken);
  const overlapWords = tokensToWords(overlapTokens, wordsPerToken);

  const drafts = buildSections(content.replace(/\r\n?/g, '\n')).flatMap((section) =>
    splitSection(section, budgetWords)
  );

  drafts.forEach((draft, i) => {
    const previous = drafts[i - 1];
    if (previous && sameTopSection(previous, draft)) {
      draft.overlap = trailingOverlap(previous.body, overlapWords);
    }
  });

  return drafts.map((draft) => {
    const parts = [draft.heading, ...draft.overlap.map((p) => p.text), ...draft.body.map((p) => p.text)];
    const text = parts.filter((part) => part.length > 0).join('\n\n');
    return {
      text,
      tokenEstimate: estimateTokens(text, wordsPerToken),
      metadata: {
        headingPath: [...draft.headingPath],
        level: draft.level,
        startLine: draft.startLine,
      },
    };
  });
}
