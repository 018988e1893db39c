export { BoundedSubAgent, type AuthorityBoundary, type SubAgentOptions } from './bounded-agent.js';
export { LogisticsSubAgent } from './logistics.js';
export { MedicalSubAgent } from './medical.js';
export {
  dispatchPayloadSchema,
  medicalRoutingPayloadSchema,
  DISPATCH_SCHEMA_VERSION,
  MEDICAL_SCHEMA_VERSION,
  SEVERITIES,
  type DispatchPayload,
  type MedicalRoutingPayload
} from './payloads.js';
