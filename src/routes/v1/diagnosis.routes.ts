/**
 * Diagnosis Routes
 */

import { Router } from 'express';
import { DiagnosisController } from '../../controllers/diagnosis.controller';
import { createDiagnosisLimiter, validateContentType } from '../../middleware/security.middleware';

export interface DiagnosisRouteOptions {
    rateLimitPerMinute: number;
}

export function createDiagnosisRouter(controller: DiagnosisController, options: DiagnosisRouteOptions): Router {
    const router = Router();

    router.post('/diagnosis', createDiagnosisLimiter(options.rateLimitPerMinute), validateContentType, controller.diagnose);
    router.get('/status', controller.status);

    return router;
}
