/**
 * Client exports
 */

export { BaseGrpcClient, type ClientConfig } from './base.js';
export {
  TablebaseClient,
  DEFAULT_TABLEBASE_CONFIG,
  moveProbeToResult,
  toProbeTable,
} from './tablebase.js';
