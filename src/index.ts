// Gesture Segmenter - Entry point
// Loads configuration, then either serves the recording/processing API or,
// with `segment <participant>`, runs one segmentation pass and exits.

import "dotenv/config";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { FfmpegCodec } from "./ffmpeg-codec.js";
import { FilePersistence } from "./file-persistence.js";
import { createLogger } from "./logger.js";
import { SegmentPipeline } from "./segment-pipeline.js";
import { createAppServer } from "./server.js";
import type { AppConfig } from "./types.js";

export const APP_NAME = "Gesture Segmenter";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Configuration ──────────────────────────────────────────────────────────────

function readConfig(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (err) {
    logFatal(errorMessage(err));
    process.exit(1);
  }
}

const config = readConfig();

const persistence = new FilePersistence(config.pipeline.basePath);
const [command, participantId] = process.argv.slice(2);

// ─── One-shot segmentation ──────────────────────────────────────────────────────

async function segment(pid: string): Promise<void> {
  const pipeline = new SegmentPipeline(config.pipeline, {
    codec: config.pipeline.statsOnly
      ? null
      : new FfmpegCodec({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath }),
    persistence,
    logger: createLogger("SegmentPipeline"),
  });
  const result = await pipeline.run(pid);
  logInit(`Summary: ${result.summaryPath}`);
  logInit(`Report:  ${result.reportPath}`);
  if (result.frameExport) {
    logInit(`Frames:  ${result.frameExport.timestampsPath} (${result.frameExport.extractedFrames} images)`);
  }
}

if (command === "segment") {
  if (!participantId) {
    logFatal("Usage: segment <participant-id>");
    process.exit(1);
  }
  segment(participantId).then(
    () => process.exit(0),
    (err: unknown) => {
      logFatal(errorMessage(err));
      process.exit(1);
    },
  );
} else {
  // ─── Start server ─────────────────────────────────────────────────────────────

  logInit(`Dataset: ${config.pipeline.basePath}, schedules: ${config.schedulesDir}`);
  const server = createAppServer({ config, persistence });

  server.listen(config.port).then(
    () => {
      logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
      logInit("Ready for connections");
    },
    (err: unknown) => {
      logFatal(`Could not listen on port ${config.port}: ${errorMessage(err)}`);
      process.exit(1);
    },
  );
}
