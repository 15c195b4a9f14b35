export {
  type OutputFormat,
  type WriteReportOptions,
  type DatasetSnapshot,
  DEFAULT_FILENAME_TEMPLATE,
  RawDatasetSchema,
  DatasetSnapshotSchema,
  resolveFilename,
  writeReport,
  saveDatasets,
  loadDatasets,
} from './writer.js';

export { formatMarkdown } from './markdown.js';

export {
  type JsonOutput,
  type JsonSectionOutput,
  toJsonOutput,
  formatJson,
} from './json.js';
