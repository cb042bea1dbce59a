import { createLogger } from '@hostkit/logging';

export const logger = createLogger('net');
