/**
 * Model stress test: run textbook cases through the loaded classifier.
 * Run with: npm run check:model
 */
import { FileModelStore } from '../src/ai/classifier/model-store';
import { ClassifierAdapter } from '../src/ai/classifier/classifier.adapter';
import { vectorize } from '../src/services/feature-vectorizer.service';
import { validatePatientRecord } from '../src/models/patient.schema';
import { config } from '../src/config/env';

const CASES = [
    {
        name: 'Septic shock (critical)',
        expected: 'Sepsis',
        record: { age: 65, temperature: 39.5, heartRate: 115, respiratoryRate: 28, systolicBp: 85, diastolicBp: 50, oxygenSaturation: 88, painScore: 0 },
    },
    {
        name: 'Healthy adult (control)',
        expected: 'Other',
        record: { age: 30, temperature: 37.0, heartRate: 70, respiratoryRate: 16, systolicBp: 120, diastolicBp: 80, oxygenSaturation: 99, painScore: 0 },
    },
    {
        name: 'Hypertensive crisis (cardio)',
        expected: 'Cardiovascular',
        record: { age: 55, temperature: 36.8, heartRate: 95, respiratoryRate: 20, systolicBp: 210, diastolicBp: 120, oxygenSaturation: 96, painScore: 0 },
    },
    {
        name: 'Trauma / blood loss',
        expected: 'Trauma',
        record: { age: 25, temperature: 36.5, heartRate: 130, respiratoryRate: 22, systolicBp: 80, diastolicBp: 50, oxygenSaturation: 98, painScore: 0 },
    },
];

async function main() {
    console.log(`📂 Loading model from: ${config.modelDir}`);
    const loaded = await new FileModelStore(config.modelDir).load();
    const classifier = new ClassifierAdapter(loaded);
    console.log(`ℹ️  Model expects ${loaded.featureNames.length} features: ${loaded.featureNames.join(', ')}\n`);

    let mismatches = 0;
    for (const testCase of CASES) {
        const record = validatePatientRecord(testCase.record);
        const opinion = classifier.predict(vectorize(record, classifier.featureSchema()));
        const ok = opinion.label === testCase.expected;
        if (!ok) mismatches++;

        console.log(`📋 ${testCase.name}`);
        console.log(`   Diagnosis:  ${opinion.label}`);
        console.log(`   Confidence: ${opinion.confidence.toFixed(4)}`);
        console.log(`   ${ok ? '✅' : '⚠️ '} expected ${testCase.expected}\n`);
    }

    if (mismatches) {
        console.log(`${mismatches} case(s) did not match the expected class`);
        process.exitCode = 1;
    }
}

main().catch(error => {
    console.error('❌ Model check failed:', error);
    process.exit(1);
});
