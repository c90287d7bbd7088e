/**
 * Pre-Generate Demo Data Script
 * ==============================
 *
 * Writes synthetic paddling sessions for replay through the input engine.
 * Noise is seeded, so every run writes the same files.
 *
 * Run this script with: npx tsx scripts/generateDemoData.ts
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { replaySession, type PaddleRecording, type RecordedSample } from '../src/lib/playback/replaySession';

// ESM-compatible __dirname
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// ============================================================================
// CONFIGURATION
// ============================================================================

const SAMPLE_RATE = 50;
const OUTPUT_DIR = path.join(__dirname, '../demo-data');
const SEED = 0x5eed;

type SegmentType = 'hold' | 'rest' | 'alternate' | 'turn-left' | 'turn-right' | 'start-jolt' | 'restart-jolt';

interface DemoSession {
    id: string;
    name: string;
    durationMs: number;
    segments: { type: SegmentType; startMs: number; endMs: number }[];
}

// ============================================================================
// NOISE
// ============================================================================

/** mulberry32 */
function createRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

let random = createRandom(SEED);

function gaussianNoise(mean: number, stdDev: number): number {
    const u1 = Math.max(random(), Number.EPSILON);
    const u2 = random();
    const z0 = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + z0 * stdDev;
}

function round(value: number, digits = 2): number {
    const scale = 10 ** digits;
    return Math.round(value * scale) / scale;
}

// ============================================================================
// SAMPLE GENERATORS
// ============================================================================

/** Constant gyro bias of the simulated sensor (deg/s) */
const GYRO_BIAS: [number, number, number] = [0.8, -0.4, 0.3];

function gyro(x: number, y: number, z: number, stdDev: number): [number, number, number] {
    return [
        round(gaussianNoise(GYRO_BIAS[0] + x, stdDev)),
        round(gaussianNoise(GYRO_BIAS[1] + y, stdDev)),
        round(gaussianNoise(GYRO_BIAS[2] + z, stdDev)),
    ];
}

function accel(mean: number): number {
    return Math.round(gaussianNoise(mean, 40));
}

function generateSample(type: SegmentType, timeMs: number, segmentStartMs: number): RecordedSample {
    const local = (timeMs - segmentStartMs) / 1000;
    switch (type) {
        case 'hold':
            return { gyro: gyro(0, 0, 0, 0.2), accelY: accel(0), t: timeMs };
        case 'alternate': {
            // One stroke per side every 1.2s, peaks of ±40 deg/s
            const swing = 40 * Math.sin(2 * Math.PI * (local / 1.2) + Math.PI / 2);
            return { gyro: gyro(swing, swing * 0.2, 0, 1.5), accelY: accel(300 * Math.sin(2 * Math.PI * local)), t: timeMs };
        }
        case 'turn-left':
            return { gyro: gyro(-25, 2, 0, 1), accelY: accel(-600), t: timeMs };
        case 'turn-right':
            return { gyro: gyro(25, -2, 0, 1), accelY: accel(600), t: timeMs };
        case 'start-jolt':
            return { gyro: gyro(0, 0, 0, 0.5), accelY: local === 0 ? 9500 : accel(0), t: timeMs };
        case 'restart-jolt':
            return { gyro: gyro(0, 0, 0, 0.5), accelY: local === 0 ? -9500 : accel(0), t: timeMs };
        default:
            return { gyro: gyro(0, 0, 0, 0.5), accelY: accel(0), t: timeMs };
    }
}

function getSegmentAtTime(segments: DemoSession['segments'], timeMs: number): DemoSession['segments'][number] | null {
    for (const seg of segments) {
        if (timeMs >= seg.startMs && timeMs < seg.endMs) return seg;
    }
    return null;
}

// ============================================================================
// DEMO SESSIONS
// ============================================================================

const DEMO_SESSIONS: DemoSession[] = [
    {
        id: 'demo-paddle-001',
        name: 'Paddle Warm-up',
        durationMs: 30000,
        segments: [
            { type: 'hold', startMs: 0, endMs: 3000 },
            { type: 'start-jolt', startMs: 3000, endMs: 4000 },
            { type: 'rest', startMs: 4000, endMs: 5000 },
            { type: 'alternate', startMs: 5000, endMs: 15000 },
            { type: 'rest', startMs: 15000, endMs: 16000 },
            { type: 'turn-right', startMs: 16000, endMs: 20000 },
            { type: 'rest', startMs: 20000, endMs: 21000 },
            { type: 'turn-left', startMs: 21000, endMs: 25000 },
            { type: 'rest', startMs: 25000, endMs: 28000 },
            { type: 'restart-jolt', startMs: 28000, endMs: 30000 },
        ],
    },
    {
        id: 'demo-paddle-002',
        name: 'Long Forward Run',
        durationMs: 40000,
        segments: [
            { type: 'hold', startMs: 0, endMs: 3000 },
            { type: 'rest', startMs: 3000, endMs: 4000 },
            { type: 'alternate', startMs: 4000, endMs: 36000 },
            { type: 'rest', startMs: 36000, endMs: 40000 },
        ],
    },
];

// ============================================================================
// GENERATE
// ============================================================================

function generateSession(config: DemoSession): PaddleRecording {
    random = createRandom(SEED);
    const sampleInterval = 1000 / SAMPLE_RATE;
    const samples: RecordedSample[] = [];

    for (let timeMs = 0; timeMs < config.durationMs; timeMs += sampleInterval) {
        const segment = getSegmentAtTime(config.segments, timeMs);
        samples.push(generateSample(segment?.type ?? 'rest', timeMs, segment?.startMs ?? 0));
    }

    return {
        name: config.name,
        sampleRateHz: SAMPLE_RATE,
        config: { calibration: { mode: 'zero-point', requiredSamples: 100, minSamples: 50, duration: 3 } },
        samples,
    };
}

// ============================================================================
// MAIN
// ============================================================================

console.log('Generating paddle demo sessions...\n');

if (!fs.existsSync(OUTPUT_DIR)) {
    fs.mkdirSync(OUTPUT_DIR, { recursive: true });
}

for (const config of DEMO_SESSIONS) {
    const recording = generateSession(config);
    const file = path.join(OUTPUT_DIR, `${config.id}.json`);
    fs.writeFileSync(file, JSON.stringify(recording));

    const { events, dropped } = replaySession(recording, { calibrate: 'zero-point' });
    const counts = new Map<string, number>();
    for (const event of events) {
        counts.set(event.type, (counts.get(event.type) ?? 0) + 1);
    }
    const breakdown = [...counts].map(([type, n]) => `${type} ${n}`).join(', ');

    console.log(`  ${config.name}: ${recording.samples.length} samples → ${path.relative(process.cwd(), file)}`);
    console.log(`    replay: ${events.length} events (${breakdown || 'none'}), ${dropped} dropped`);
}

console.log(`\nSaved ${DEMO_SESSIONS.length} sessions to demo-data/`);
