import path from "node:path";
import { promises as fs } from "node:fs";
import {configFromEnv} from "../src/config/inspection-config";
import {InspectionPipeline} from "../src/pipeline/inspection-pipeline";
import {ImageProcessor} from "../src/processors/image-processor";

// Feeds every image in a directory through one session, in name order,
// and writes the per-scan summaries plus the session overview as JSON.

const [, , inputDirArg] = process.argv;
if (!inputDirArg) {
    console.error("Usage: tsx examples/session-replay.ts path/to/images_dir");
    process.exit(1);
}
const inputDir = path.resolve(process.cwd(), inputDirArg);
const outDir = path.resolve(process.cwd(), "images/processed");
await fs.mkdir(outDir, { recursive: true });

const pipeline = InspectionPipeline.create(configFromEnv());
const session = pipeline.createSession();
const files = new ImageProcessor();

const entries = (await fs.readdir(inputDir)).sort();
const scans: Array<{ filename: string; count?: number; trend?: unknown; error?: string }> = [];

for (const filename of entries) {
    const inputPath = path.join(inputDir, filename);
    const { size } = await fs.stat(inputPath);
    const check = files.validateImageFile(filename, size);
    if (!check.valid) {
        console.log(`⏭ ${filename}: ${check.reason}`);
        continue;
    }

    const outcome = await pipeline.inspect(inputPath, session);
    if (!outcome.ok) {
        console.error(`❌ ${filename}: ${outcome.error.message}`);
        scans.push({ filename, error: outcome.error.message });
        if (outcome.error.kind === "model-load") break;
        continue;
    }
    const { summary } = outcome;
    const delta = summary.trend ? ` (Δ ${summary.trend.countDelta >= 0 ? "+" : ""}${summary.trend.countDelta})` : "";
    console.log(`✔ ${filename}: ${summary.count} detection(s)${delta}`);
    scans.push({ filename, count: summary.count, trend: summary.trend });
}

const overview = pipeline.overview(session);
const { stats } = overview;
console.log(`\nScans: ${stats.totalScans}, detections: ${stats.totalDetections}, with detections: ${stats.scansWithDetections}/${stats.totalScans}`);
if (stats.averagePerScan !== null) {
    console.log(`Average per scan: ${stats.averagePerScan.toFixed(1)}`);
}

const reportPath = path.join(outDir, "session.json");
await fs.writeFile(
    reportPath,
    JSON.stringify({ startedAt: session.startedAt.toISOString(), inputDir, scans, overview }, null, 2),
    "utf8",
);
console.log(`💾 Report saved: ${reportPath}`);
