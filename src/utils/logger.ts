import 'dotenv/config';
import { pino } from 'pino';

const logger = pino({
  name: 'scratchpad',
  level: process.env.LOG_LEVEL || 'info',
});

export default logger;
