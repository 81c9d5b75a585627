import { createLogger } from '../../../../shared/lib/logger.js';

export const logger = createLogger('parse-worker');

export default logger;
