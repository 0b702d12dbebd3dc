/**
 * Treatment Plan Assembler
 * Asks the reviewer for a plan for the final diagnosis; falls back to the
 * static protocol table in data/treatment-protocols.json.
 */

import { z } from 'zod';
import protocolTable from '../data/treatment-protocols.json';
import { ClinicalReviewer } from './clinical-reviewer.service';
import { PatientRecord } from '../models/patient.schema';
import { DiagnoseOptions, TreatmentPlan, TreatmentStep } from '../models/diagnosis-types';
import { errorMessage } from '../utils/errors';
import { matchesAny } from '../utils/keywords';
import logger from '../utils/logger';

const ProtocolSchema = z.object({
    id: z.string().min(1),
    keywords: z.array(z.string().min(1)),
    steps: z.array(z.object({ category: z.string().min(1), action: z.string().min(1) })).min(1),
});

export const ProtocolTableSchema = z.object({
    protocols: z
        .array(ProtocolSchema)
        .min(1)
        .refine(list => list[list.length - 1].keywords.length === 0, {
            message: 'The last protocol must be a catch-all with no keywords',
        }),
});

export type TreatmentProtocol = z.infer<typeof ProtocolSchema>;

export const DEFAULT_PROTOCOLS: readonly TreatmentProtocol[] = ProtocolTableSchema.parse(protocolTable).protocols;

/**
 * First protocol whose keywords match the diagnosis; a protocol without
 * keywords matches anything.
 */
export function selectProtocol(diagnosis: string, protocols: readonly TreatmentProtocol[] = DEFAULT_PROTOCOLS): TreatmentProtocol {
    const match = protocols.find(p => p.keywords.length === 0 || matchesAny(diagnosis, p.keywords));
    // The table schema guarantees a catch-all, so this only trips on a hand-built list.
    if (!match) throw new Error(`No treatment protocol matches "${diagnosis}"`);
    return match;
}

const copyStep = (step: TreatmentStep): TreatmentStep => ({ category: step.category, action: step.action });

export interface PlanSubject {
    primaryDiagnosis: string;
    severityScore: number;
}

export class TreatmentPlanService {
    constructor(
        private readonly reviewer: ClinicalReviewer,
        private readonly protocols: readonly TreatmentProtocol[] = DEFAULT_PROTOCOLS,
    ) {}

    async assemble(subject: PlanSubject, record: PatientRecord, options: DiagnoseOptions = {}): Promise<TreatmentPlan> {
        const steps = await this.reviewerPlan(subject, record, options);
        if (steps?.length) {
            return { source: 'reviewer', protocol: null, steps: steps.map(copyStep) };
        }

        const protocol = selectProtocol(subject.primaryDiagnosis, this.protocols);
        logger.debug({ diagnosis: subject.primaryDiagnosis, protocol: protocol.id }, 'Using static treatment protocol');
        return {
            source: 'protocol',
            protocol: protocol.id,
            steps: protocol.steps.map(copyStep),
        };
    }

    private async reviewerPlan(subject: PlanSubject, record: PatientRecord, options: DiagnoseOptions): Promise<TreatmentStep[] | null> {
        try {
            return await this.reviewer.planTreatment(subject.primaryDiagnosis, subject.severityScore, record, options);
        } catch (error) {
            logger.warn({ reviewer: this.reviewer.name, error: errorMessage(error) }, 'Reviewer treatment plan rejected');
            return null;
        }
    }
}
