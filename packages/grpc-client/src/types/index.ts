export {
  moveProbeSchema,
  probeResponseSchema,
  healthCheckResponseSchema,
  type MoveProbe,
  type ProbeResponse,
  type ProbeRequest,
  type TablebaseHealthCheckResponse,
} from './tablebase.js';
