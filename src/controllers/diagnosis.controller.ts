/**
 * Diagnosis Controller
 * REST endpoints for the hybrid diagnosis pipeline.
 */

import { Request, Response, NextFunction } from 'express';
import { DiagnosisOrchestrator } from '../services/diagnosis-orchestrator.service';
import { toPatientRecordInput } from '../models/patient.schema';
import logger from '../utils/logger';

export const EMERGENCY_HEADER = 'X-Diagnosis-Emergency';

export const createDiagnosisController = (orchestrator: DiagnosisOrchestrator) => ({
    /**
     * POST /api/v1/diagnosis
     * Run the full pipeline for one patient.
     */
    diagnose: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        // A client that disconnects abandons any in-flight reviewer call
        const abort = new AbortController();
        const onClose = () => {
            if (!res.writableEnded) abort.abort();
        };
        res.on('close', onClose);

        try {
            const input = toPatientRecordInput(req.body);
            const result = await orchestrator.diagnose(input, { signal: abort.signal });

            if (abort.signal.aborted) {
                logger.info({ diagnosis: result.primaryDiagnosis }, 'Client disconnected before diagnosis was returned');
                return;
            }

            if (result.urgencyLevel === 'emergency') {
                res.setHeader(EMERGENCY_HEADER, 'true');
            }

            res.status(200).json({ data: result });
        } catch (error) {
            next(error);
        } finally {
            res.off('close', onClose);
        }
    },

    /**
     * GET /api/v1/status
     */
    status: (req: Request, res: Response): void => {
        res.status(200).json({ data: orchestrator.status() });
    },
});

export type DiagnosisController = ReturnType<typeof createDiagnosisController>;
