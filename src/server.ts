import { createApp } from './app';
import { config } from './config/env';
import { loadReviewerConfig } from './config/reviewer.config';
import { ClassifierAdapter } from './ai/classifier/classifier.adapter';
import { FileModelStore, LoadedModel } from './ai/classifier/model-store';
import { createClinicalReviewer } from './services/clinical-reviewer.service';
import { DiagnosisOrchestrator } from './services/diagnosis-orchestrator.service';
import { ModelUnavailableError } from './utils/errors';
import logger from './utils/logger';

async function loadModel(): Promise<LoadedModel | null> {
    try {
        return await new FileModelStore(config.modelDir).load();
    } catch (error) {
        if (error instanceof ModelUnavailableError) {
            logger.error({ err: error }, 'Classifier model unavailable, requests will be scored from vitals only');
            return null;
        }
        throw error;
    }
}

async function main(): Promise<void> {
    logger.info('Server starting...');

    const classifier = new ClassifierAdapter(await loadModel());
    const reviewer = createClinicalReviewer(loadReviewerConfig());
    const orchestrator = new DiagnosisOrchestrator(classifier, reviewer);

    const app = createApp({
        orchestrator,
        allowedOrigins: config.allowedOrigins,
        diagnosisRateLimitPerMinute: config.diagnosisRateLimitPerMinute,
    });

    app.listen(config.port, () => {
        logger.info({ port: config.port, status: orchestrator.status() }, 'Server is listening');
    });
}

main().catch(error => {
    logger.fatal({ err: error }, 'Server failed to start');
    process.exit(1);
});
