/**
 * Clinical Reviewer Prompt Templates
 * The reviewer independently assesses the same patient context the classifier saw.
 */

import { PatientRecord } from '../../models/patient.schema';
import { ClassifierOpinion } from '../../models/diagnosis-types';

// ═══════════════════════════════════════════
// SYSTEM PROMPTS
// ═══════════════════════════════════════════

export const SYSTEM_PROMPTS = {
    /**
     * Second-opinion review of the classifier's finding.
     */
    CLINICAL_REVIEW: `You are a board-certified physician acting as a senior medical consultant.
You review an automated classifier's finding against the patient's presentation.

RULES:
- Base your diagnosis ONLY on the patient data provided
- Be SPECIFIC (e.g., "Acute Myocardial Infarction", not "Cardiovascular")
- Rate your certainty between 0 and 1
- Return ONLY valid JSON, no prose before or after`,

    /**
     * Treatment planning for the final diagnosis.
     */
    TREATMENT_PLAN: `You are a clinical treatment planner supporting emergency and ward clinicians.

RULES:
- Base recommendations ONLY on the stated diagnosis, severity and patient data
- Check the listed allergies and current medications before suggesting drugs
- Include doses where a medication is named
- Return ONLY valid JSON, no prose before or after`,
};

// ═══════════════════════════════════════════
// USER PROMPTS
// ═══════════════════════════════════════════

export function buildPatientContext(record: PatientRecord): string {
    const lines = [
        `Age: ${record.age} years`,
        `Gender: ${record.gender}`,
        `Temperature: ${record.temperature}°C`,
        `Heart Rate: ${record.heartRate} bpm`,
        `Blood Pressure: ${record.systolicBp}/${record.diastolicBp} mmHg`,
        `Respiratory Rate: ${record.respiratoryRate} /min`,
        `Oxygen Saturation: ${record.oxygenSaturation}%`,
        `Pain Score: ${record.painScore}/10`,
    ];

    if (record.symptoms.length) lines.push(`Symptoms: ${record.symptoms.join(', ')}`);
    if (record.medicalHistory.length) lines.push(`Medical History: ${record.medicalHistory.join(', ')}`);
    if (record.medications.length) lines.push(`Medications: ${record.medications.join(', ')}`);
    if (record.allergies.length) lines.push(`Allergies: ${record.allergies.join(', ')}`);

    return lines.join('\n');
}

export function buildReviewPrompt(opinion: ClassifierOpinion, record: PatientRecord): string {
    return `Review this case:

PATIENT DATA:
${buildPatientContext(record)}

ML MODEL FINDINGS:
- Diagnosis: ${opinion.label}
- Confidence: ${(opinion.confidence * 100).toFixed(1)}%

YOUR TASK:
1. Provide YOUR diagnosis based solely on the clinical presentation above
2. Validate whether the ML diagnosis is correct
3. If the ML diagnosis is wrong or vague, provide a specific correction
4. Explain your clinical reasoning
5. List differential diagnoses, most likely first
6. Identify red flags

Return ONLY JSON with this structure:
{
  "diagnosis": "Your specific diagnosis",
  "validation_verdict": "Correct | Partially Correct | Incorrect | Unsure",
  "certainty": 0.0,
  "clinical_reasoning": "Your explanation",
  "differentials": ["dx1", "dx2", "dx3"],
  "red_flags": ["flag1", "flag2"],
  "needs_override": false,
  "override_reason": "Why the ML diagnosis should be replaced, if it should"
}`;
}

export function buildTreatmentPrompt(diagnosis: string, severityScore: number, record: PatientRecord): string {
    return `Generate a treatment plan for:

DIAGNOSIS: ${diagnosis}
SEVERITY: ${severityScore.toFixed(2)}/1.0

PATIENT CONTEXT:
${buildPatientContext(record)}

Return ONLY JSON:
{
  "immediate_interventions": ["first 24h item"],
  "medications": ["drug - dose - route - frequency"],
  "monitoring": ["what to monitor"],
  "follow_up": ["follow-up item"],
  "patient_education": ["education item"]
}`;
}
