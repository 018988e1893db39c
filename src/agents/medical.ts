import { createLogger, type Logger } from '../logger.js';
import { BoundedSubAgent } from './bounded-agent.js';
import { medicalRoutingPayloadSchema, type MedicalRoutingPayload } from './payloads.js';

/**
 * Specialist for routed missions. Records the handoff for medical
 * professionals; its schema admits no diagnosis, treatment or dosage field.
 */
export class MedicalSubAgent extends BoundedSubAgent<MedicalRoutingPayload> {
  static readonly SCOPE = '.json only | medical log directory only';

  constructor(root: string, logger: Logger = createLogger('medical-agent')) {
    super({
      name: 'MedicalSubAgent',
      root,
      allowedExtensions: ['.json'],
      schema: medicalRoutingPayloadSchema,
      logger
    });
  }
}
