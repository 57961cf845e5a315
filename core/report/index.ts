export { formatNumber, formatPoint, formatValue } from './format';
export { formatComparisonReport, formatOrientationReport } from './text-reporter';
export { formatJsonReport } from './json-reporter';
