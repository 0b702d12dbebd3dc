/**
 * Quick API smoke test against a running server.
 * Run with: npx ts-node scripts/test-api.ts
 */
const BASE = process.env.API_BASE_URL || 'http://localhost:3000';

const readJson = async (res: Response): Promise<unknown> => res.json().catch(() => null);

const field = (value: unknown, key: string): unknown =>
    typeof value === 'object' && value !== null && key in value ? Reflect.get(value, key) : undefined;

async function test() {
    console.log('🧪 Testing hybrid diagnosis API...\n');

    // 1. Health check
    const health = await readJson(await fetch(`${BASE}/health`));
    console.log(`✅ Health: ${String(field(health, 'status'))} - ${String(field(health, 'message'))}`);

    // 2. Status
    const status = field(await readJson(await fetch(`${BASE}/api/v1/status`)), 'data');
    console.log(`✅ Status: classifier loaded=${String(field(status, 'classifierLoaded'))}, reviewer=${String(field(status, 'reviewer'))}`);

    // 3. Diagnosis
    console.log('\n📤 Submitting septic presentation...');
    const res = await fetch(`${BASE}/api/v1/diagnosis`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
            age: 65,
            gender: 'female',
            temperature: 39.5,
            heartRate: 115,
            systolicBP: 85,
            diastolicBP: 50,
            respiratoryRate: 28,
            oxygenSaturation: 88,
            painScore: 4,
            fever: true,
            confusion: true,
            medicalHistory: ['Type 2 diabetes'],
        }),
    });
    const body = await readJson(res);
    const diagnosis = field(body, 'data');
    if (diagnosis) {
        console.log(`✅ ${String(field(diagnosis, 'primaryDiagnosis'))} | source: ${String(field(diagnosis, 'source'))}`);
        console.log(`   Severity: ${String(field(diagnosis, 'severityScore'))} (${String(field(diagnosis, 'urgencyLevel'))})`);
        console.log(`   Emergency header: ${res.headers.get('X-Diagnosis-Emergency') ?? 'absent'}`);
    } else {
        console.log(`⚠️  Response (${res.status}):`, JSON.stringify(body, null, 2));
    }

    // 4. Validation failure
    console.log('\n📤 Submitting out-of-range vitals...');
    const invalid = await fetch(`${BASE}/api/v1/diagnosis`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ age: 150, temperature: 50 }),
    });
    console.log(`✅ ${invalid.status}:`, JSON.stringify(field(await readJson(invalid), 'errors')));

    console.log('\n🎉 Smoke test finished');
}

test().catch(error => {
    console.error('❌ Smoke test failed:', error);
    process.exit(1);
});
