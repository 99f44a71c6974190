import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

// Morgan output goes through winston at http level
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

const skip = (): boolean => env.NODE_ENV === 'test';

export const requestLogger = morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', {
  stream,
  skip,
});

export default requestLogger;
