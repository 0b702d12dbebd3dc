/**
 * Patient Record Schema
 * Clinical range checks for the record the diagnosis core consumes,
 * plus the looser intake shape accepted over HTTP.
 */

import { z } from 'zod';
import { ValidationError } from '../utils/errors';

const GENDERS = ['male', 'female', 'other', 'unknown', 'prefer not to say'] as const;

export const GenderSchema = z.enum(GENDERS, {
    errorMap: () => ({ message: `Gender must be one of: ${GENDERS.join(', ')}` }),
});

export type Gender = z.infer<typeof GenderSchema>;

const inRange = (label: string, min: number, max: number, unit = '') =>
    z
        .number({ invalid_type_error: `${label} must be a number`, required_error: `${label} is required` })
        .finite(`${label} must be a finite number`)
        .min(min, `${label} must be between ${min}${unit} and ${max}${unit}`)
        .max(max, `${label} must be between ${min}${unit} and ${max}${unit}`);

const stringList = z.array(z.string().trim().min(1)).default([]);

export const PatientRecordSchema = z.object({
    age: inRange('Age', 0, 120, ' years'),
    gender: GenderSchema.default('unknown'),
    temperature: inRange('Temperature', 35, 43, '°C'),
    heartRate: inRange('Heart rate', 40, 200, ' bpm'),
    systolicBp: inRange('Systolic BP', 70, 250, ' mmHg'),
    diastolicBp: inRange('Diastolic BP', 40, 150, ' mmHg'),
    respiratoryRate: inRange('Respiratory rate', 5, 40, ' breaths/min'),
    oxygenSaturation: inRange('Oxygen saturation', 70, 100, '%'),
    painScore: inRange('Pain score', 0, 10),
    symptoms: stringList.transform(list => Array.from(new Set(list))),
    medicalHistory: stringList,
    allergies: stringList,
    medications: stringList,
});

export type PatientRecord = Readonly<z.infer<typeof PatientRecordSchema>>;

/**
 * Boolean symptom checkboxes sent by the intake form, mapped to symptom text.
 */
export const SYMPTOM_FLAGS: Record<string, string> = {
    fever: 'fever',
    cough: 'cough',
    shortness_of_breath: 'shortness of breath',
    fatigue: 'fatigue',
    chest_pain: 'chest pain',
    nausea: 'nausea',
    dizziness: 'dizziness',
    confusion: 'confusion',
};

/**
 * HTTP intake body. Vitals the form leaves blank default to normal values.
 */
export const DiagnosisRequestSchema = z
    .object({
        age: z.number({ required_error: 'Age is required', invalid_type_error: 'Age must be a number' }),
        gender: z
            .string()
            .trim()
            .toLowerCase()
            .transform(value => (value === '' ? 'unknown' : value))
            .optional(),
        temperature: z.number().default(37.0),
        heartRate: z.number().default(75),
        systolicBP: z.number().default(120),
        diastolicBP: z.number().default(80),
        respiratoryRate: z.number().default(16),
        oxygenSaturation: z.number().default(98),
        painScore: z.number().default(0),
        symptoms: z.array(z.unknown()).default([]),
        medicalHistory: z.array(z.string()).default([]),
        allergies: z.array(z.string()).default([]),
        medications: z.array(z.string()).default([]),
    })
    .catchall(z.unknown());

export type DiagnosisRequest = z.infer<typeof DiagnosisRequestSchema>;

const formatIssues = (error: z.ZodError): string[] =>
    error.issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

/**
 * Validate and freeze a patient record. Throws ValidationError listing every violation.
 */
export function validatePatientRecord(input: unknown): PatientRecord {
    const result = PatientRecordSchema.safeParse(input);
    if (!result.success) {
        throw new ValidationError(formatIssues(result.error));
    }
    const record = result.data;
    Object.freeze(record.symptoms);
    Object.freeze(record.medicalHistory);
    Object.freeze(record.allergies);
    Object.freeze(record.medications);
    return Object.freeze(record);
}

/**
 * Map the HTTP intake body onto the core record shape.
 */
export function toPatientRecordInput(body: unknown): Record<string, unknown> {
    const parsed = DiagnosisRequestSchema.safeParse(body);
    if (!parsed.success) {
        throw new ValidationError(formatIssues(parsed.error));
    }
    const data = parsed.data;

    const symptoms: string[] = [];
    for (const [flag, label] of Object.entries(SYMPTOM_FLAGS)) {
        if (data[flag] === true) symptoms.push(label);
    }
    for (const symptom of data.symptoms) {
        if (typeof symptom === 'string' && symptom.trim()) symptoms.push(symptom.trim());
    }

    return {
        age: data.age,
        gender: data.gender ?? 'unknown',
        temperature: data.temperature,
        heartRate: data.heartRate,
        systolicBp: data.systolicBP,
        diastolicBp: data.diastolicBP,
        respiratoryRate: data.respiratoryRate,
        oxygenSaturation: data.oxygenSaturation,
        painScore: data.painScore,
        symptoms,
        medicalHistory: data.medicalHistory,
        allergies: data.allergies,
        medications: data.medications,
    };
}
