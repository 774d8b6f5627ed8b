/**
 * Output module: mode resolution, rendering and query filtering.
 */

export {
  resolveOutputFormat,
  createGlobalSettings,
  toRenderOptions,
  type FormatInputs,
  type ResolvedFormat,
  type SettingsInputs,
} from './resolve.js';

export { OutputRenderer, applyPagination, buildListEnvelope, isEmptyValue } from './render.js';

export { jqEngine, type QueryEngine } from './query.js';

export {
  OUTPUT_MODES,
  type OutputMode,
  type GlobalSettings,
  type ListFlags,
  type RenderOptions,
  type OutputStream,
  type TableSpec,
  type ListMeta,
  type ListEnvelope,
} from './types.js';
