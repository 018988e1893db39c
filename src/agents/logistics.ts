import { createLogger, type Logger } from '../logger.js';
import { BoundedSubAgent } from './bounded-agent.js';
import { dispatchPayloadSchema, type DispatchPayload } from './payloads.js';

/** Writes logistics dispatch logs: `.json` files directly in its own directory, nothing else. */
export class LogisticsSubAgent extends BoundedSubAgent<DispatchPayload> {
  static readonly SCOPE = '.json only | dispatch directory only';

  constructor(root: string, logger: Logger = createLogger('logistics-agent')) {
    super({
      name: 'LogisticsSubAgent',
      root,
      allowedExtensions: ['.json'],
      schema: dispatchPayloadSchema,
      logger
    });
  }
}
