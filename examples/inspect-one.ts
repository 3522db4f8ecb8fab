import path from "node:path";
import { promises as fs } from "node:fs";
import {configFromEnv, parseThresholdArg} from "../src/config/inspection-config";
import {InspectionPipeline} from "../src/pipeline/inspection-pipeline";
import {describeModel} from "../src/models/weights-handle";
import {drawDetectionsOnBuffer} from "../src/utils/draw-detections";

const USAGE = "Usage: tsx examples/inspect-one.ts path/to/image.jpg [threshold in (0, 1)]";

const [, , imagePathArg, thresholdArg] = process.argv;
if (!imagePathArg) {
    console.error(USAGE);
    process.exit(1);
}
const config = configFromEnv();
const threshold = parseThresholdArg(thresholdArg, config.confidenceThreshold);
if (threshold === null) {
    console.error(`Invalid threshold: "${thresholdArg}"`);
    console.error(USAGE);
    process.exit(1);
}
const imagePath = path.resolve(process.cwd(), imagePathArg);
const outDir = path.resolve(process.cwd(), "images/processed");
await fs.mkdir(outDir, { recursive: true });

const pipeline = InspectionPipeline.create(config);
const session = pipeline.createSession();

const outcome = await pipeline.inspect(imagePath, session, { threshold });
if (!outcome.ok) {
    const { error } = outcome;
    console.error(`❌ ${error.name}: ${error.message}`);
    if (error.kind === "invalid-image") console.error(error.hint);
    process.exit(1);
}

const model = await pipeline.registry.getModel(config.weightsPath);
console.log("Model:", JSON.stringify(describeModel(model)));

const { result, summary } = outcome;
console.log(`${summary.status === "Critical" ? "🔴" : "🟢"} ${summary.count} detection(s) at threshold ${result.threshold}`);
result.records.forEach((r, i) => {
    console.log(`  ${i + 1}. ${r.classLabel} ${(r.confidence * 100).toFixed(1)}% [${r.severity}]`);
});
console.log("Summary:", JSON.stringify(summary, null, 2));

const vis = await drawDetectionsOnBuffer(await fs.readFile(imagePath), result.records);
const outPath = path.join(outDir, path.basename(imagePath));
await fs.writeFile(outPath, vis);
console.log("Saved overlay:", outPath);
