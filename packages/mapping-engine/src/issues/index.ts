export { issues, renderIssue } from './issues.js';
