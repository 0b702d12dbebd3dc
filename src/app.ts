import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import bodyParser from 'body-parser';
import pinoHttp from 'pino-http';
import { errorHandler, notFound } from './middleware/errorHandler';
import { createCorsOptions, helmetConfig } from './middleware/security.middleware';
import { createDiagnosisController } from './controllers/diagnosis.controller';
import { createDiagnosisRouter } from './routes/v1/diagnosis.routes';
import { DiagnosisOrchestrator } from './services/diagnosis-orchestrator.service';
import logger from './utils/logger';

export interface AppDependencies {
    orchestrator: DiagnosisOrchestrator;
    allowedOrigins: string[];
    diagnosisRateLimitPerMinute: number;
}

export function createApp(deps: AppDependencies): Application {
    const app: Application = express();

    // Middleware
    app.use(pinoHttp({ logger }));
    app.use(helmetConfig);
    app.use(cors(createCorsOptions(deps.allowedOrigins)));
    app.use(bodyParser.json({ limit: '1mb' }));

    // Routes
    app.get('/health', (req: Request, res: Response) => {
        res.status(200).json({ status: 'OK', message: 'Hybrid diagnosis API is running' });
    });

    const controller = createDiagnosisController(deps.orchestrator);
    app.use(
        '/api/v1',
        createDiagnosisRouter(controller, { rateLimitPerMinute: deps.diagnosisRateLimitPerMinute }),
    );

    // Error Handling
    app.use(notFound);
    app.use(errorHandler);

    return app;
}
