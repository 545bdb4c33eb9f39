export { formatBatchSummary } from './summary-formatter.js';
