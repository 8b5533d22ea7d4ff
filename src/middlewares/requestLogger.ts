import { Request } from 'express';
import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

// Morgan writes access lines into winston at info level
const stream: StreamOptions = {
  write: (message: string) => {
    logger.info(message.trim());
  },
};

// Silent under test; liveness probes would drown everything else
const skip = (req: Request): boolean =>
  env.NODE_ENV === 'test' || req.originalUrl.endsWith('/health/live');

export const requestLogger = morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', {
  stream,
  skip,
});

export default requestLogger;
