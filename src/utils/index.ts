/**
 * Utilities Module
 */

export {
  formatTable,
  type Column,
  type Alignment,
  type Row,
} from './table.js';

export { safeJsonParse } from './json.js';

export { silentLogger, type Logger } from './logger.js';

export { formatBytes, formatNumber, formatRelativeTime } from './format.js';
