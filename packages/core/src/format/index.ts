export { type Section, buildSections, orderSections, sectionName } from './sections.js';
export {
  formatSection,
  formatSections,
  sectionMetrics,
  startMarker,
  endMarker,
} from './table.js';
export { formatValue, metricLabel, DISPLAY_DECIMALS, MISSING_VALUE } from './values.js';
export {
  type ChangeKind,
  type MetricChange,
  DIFFERENCE_METRICS,
  metricChange,
  recordChanges,
  findCounterpart,
  formatChange,
} from './changes.js';
