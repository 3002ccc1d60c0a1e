export { FindingParser, toSeverity } from './FindingParser';
