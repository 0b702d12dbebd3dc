import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

export const config = {
    port: Number(process.env.PORT) || 3000,
    nodeEnv: process.env.NODE_ENV || 'production',
    logLevel: process.env.LOG_LEVEL || 'info',
    modelDir: path.resolve(process.env.MODEL_DIR || 'models'),
    allowedOrigins: (process.env.ALLOWED_ORIGINS || 'http://localhost:3000,http://localhost:5000')
        .split(',')
        .map(origin => origin.trim())
        .filter(Boolean),
    diagnosisRateLimitPerMinute: Number(process.env.DIAGNOSIS_RATE_LIMIT) || 10,
};
