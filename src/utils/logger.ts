import pino from 'pino';
import { config } from '../config/env';

const logger = pino({
    name: 'hybrid-diagnosis',
    level: config.logLevel,
    redact: ['req.headers.authorization'],
});

export default logger;
