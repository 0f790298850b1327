/**
 * Output module - serializes statements to record (CSV) and interchange (OFX) documents.
 */

export {
  writeRecordDocument,
  readRecordDocument,
  parseRecordRows,
  type RecordWriteOptions,
  type RecordReadOptions,
} from './record-document.js';

export { renderOfxDocument, renderNode, buildOfxTree, escapeOfx, OFX_PREAMBLE } from './ofx-document.js';

export {
  fileNameFromOption,
  fileNameForStatement,
  mergeFailedFileName,
  rangeStamp,
  type OutputOption,
} from './file-naming.js';
