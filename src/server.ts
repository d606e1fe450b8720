// Gesture Segmenter - Express Server and WebSocket broadcast
//
// HTTP routes cover the recording side (schedules, gesture onsets, scheduler
// sessions, manual labels) and the processing side (segmentation runs).
// Every WebSocket client receives the same broadcast stream of session
// events and run progress; clients never send commands over the socket.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { readFile } from "node:fs/promises";
import { createServer, type Server as HttpServer } from "node:http";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { WebSocketServer, WebSocket } from "ws";
import { isNotFound } from "./camera-discovery.js";
import { DEFAULT_APP_CONFIG } from "./config.js";
import { SegmenterError, ValidationError, errorMessage } from "./errors.js";
import {
  DEFAULT_SCHEDULER_CONFIG,
  ExperimentScheduler,
  startTicking,
  type SchedulerConfig,
} from "./experiment-scheduler.js";
import { FfmpegCodec } from "./ffmpeg-codec.js";
import { FilePersistence } from "./file-persistence.js";
import { GestureRecorder, PARTICIPANT_ID_PATTERN, parseGestureLogRequest } from "./gesture-recorder.js";
import { LabelSession } from "./label-session.js";
import { createLogger, type Logger } from "./logger.js";
import { SegmentPipeline } from "./segment-pipeline.js";
import type { AppConfig, PipelineConfig, SchedulerEvent, ServerMessage } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Scheduler tick interval for live sessions */
const SESSION_TICK_INTERVAL_MS = 1000;

/** Finished runs kept for `GET /runs/:runId`; older ones are dropped. */
const FINISHED_RUN_HISTORY = 50;

const SCHEDULE_FILE_PATTERN = /^[\w-]+(?:\.[\w-]+)*\.json$/;

// ─── Per-participant state ──────────────────────────────────────────────────────

interface ActiveSession {
  sessionId: string;
  participantId: string;
  scheduler: ExperimentScheduler;
  stop: () => void;
}

type RunStatus = "running" | "complete" | "aborted" | "failed";

interface RunHandle {
  runId: string;
  participantId: string;
  status: RunStatus;
  controller: AbortController;
  done: Promise<void>;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  config?: AppConfig;
  /** Custom logger. Defaults to the console logger. */
  logger?: Logger;
  persistence?: FilePersistence;
  recorder?: GestureRecorder;
  /** Builds the pipeline for a run. Defaults to an ffmpeg-backed pipeline. */
  pipelineFactory?: (config: PipelineConfig) => SegmentPipeline;
  schedulerConfig?: SchedulerConfig;
  tickIntervalMs?: number;
  finishedRunHistory?: number;
  /** Clock for label entries and scheduler-recorded onsets. */
  now?: () => Date;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  recorder: GestureRecorder;
  broadcast(message: ServerMessage): void;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Stop sessions, abort runs and shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const config = options.config ?? DEFAULT_APP_CONFIG;
  const logger = options.logger ?? createLogger("Server");
  const persistence = options.persistence ?? new FilePersistence(config.pipeline.basePath);
  const recorder = options.recorder ?? new GestureRecorder(persistence);
  const schedulerConfig = options.schedulerConfig ?? DEFAULT_SCHEDULER_CONFIG;
  const tickIntervalMs = options.tickIntervalMs ?? SESSION_TICK_INTERVAL_MS;
  const finishedRunHistory = options.finishedRunHistory ?? FINISHED_RUN_HISTORY;
  const now = options.now ?? (() => new Date());
  const pipelineFactory =
    options.pipelineFactory ??
    ((pipelineConfig: PipelineConfig) =>
      new SegmentPipeline(pipelineConfig, {
        codec: pipelineConfig.statsOnly
          ? null
          : new FfmpegCodec({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath }),
        persistence,
        logger: createLogger("SegmentPipeline"),
      }));

  const sessions = new Map<string, ActiveSession>();
  const labelSessions = new Map<string, LabelSession>();
  const runs = new Map<string, RunHandle>();

  const app = express();
  const httpServer = createServer(app);
  const wss = new WebSocketServer({ server: httpServer });

  app.use(express.json());

  function broadcast(message: ServerMessage): void {
    const payload = JSON.stringify(message);
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) client.send(payload);
    }
  }

  // ─── Recording routes ─────────────────────────────────────────────────────────

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get(
    "/schedules/:file",
    route(async (req, res) => {
      const file = req.params.file;
      if (!SCHEDULE_FILE_PATTERN.test(file)) {
        throw new ValidationError(`Invalid schedule file name "${file}"`);
      }
      const schedulePath = path.resolve(config.schedulesDir, file);
      try {
        res.type("application/json").send(await readFile(schedulePath, "utf-8"));
      } catch (err) {
        if (!isNotFound(err)) throw err;
        res.status(404).json({ error: `Schedule ${file} not found` });
      }
    }),
  );

  app.post(
    "/log_gesture",
    route(async (req, res) => {
      const entry = parseGestureLogRequest(req.body);
      await recorder.log(entry);
      logger.info(`Gesture ${entry.gestureIndex} "${entry.gestureName}" logged for participant ${entry.participantId}`);
      res.json({ status: "ok" });
    }),
  );

  app.post(
    "/participants/:pid/sessions",
    route(async (req, res) => {
      const participantId = participantParam(req);
      if (sessions.has(participantId)) {
        res.status(409).json({ error: `Participant ${participantId} already has a running session` });
        return;
      }

      const gestures = await resolveGestureSequence(req.body, participantId, config.schedulesDir);
      // Indices continue after the onsets already recorded for this participant
      const firstGestureIndex = await recorder.nextGestureIndex(participantId);
      if (sessions.has(participantId)) {
        res.status(409).json({ error: `Participant ${participantId} already has a running session` });
        return;
      }
      const scheduler = new ExperimentScheduler(gestures, schedulerConfig, firstGestureIndex);
      const sessionId = uuidv4();

      const handleEvents = (events: SchedulerEvent[]) => {
        for (const event of events) {
          broadcast({ type: "session_event", participantId, sessionId, event });
          if (event.type === "gesture_onset") {
            recordOnset(participantId, event.gestureIndex, event.gestureName);
          } else if (event.type === "completed") {
            sessions.get(participantId)?.stop();
            sessions.delete(participantId);
            logger.info(`Session ${sessionId} for participant ${participantId} complete`);
          }
        }
      };

      const session: ActiveSession = { sessionId, participantId, scheduler, stop: () => undefined };
      sessions.set(participantId, session);
      handleEvents(scheduler.start());
      if (sessions.get(participantId) === session) {
        session.stop = startTicking(scheduler, tickIntervalMs, handleEvents);
      }

      logger.info(
        `Session ${sessionId} started for participant ${participantId} ` +
          `(${gestures.length} gestures from index ${firstGestureIndex})`,
      );
      res.status(201).json({ sessionId, gestureCount: gestures.length, firstGestureIndex });
    }),
  );

  app.delete("/participants/:pid/sessions", (req, res) => {
    const participantId = req.params.pid;
    const session = sessions.get(participantId);
    if (!session) {
      res.status(404).json({ error: `No running session for participant ${participantId}` });
      return;
    }
    session.stop();
    sessions.delete(participantId);
    logger.info(`Session ${session.sessionId} for participant ${participantId} stopped`);
    res.status(204).end();
  });

  app.post(
    "/participants/:pid/labels",
    route(async (req, res) => {
      const participantId = participantParam(req);
      const body: unknown = req.body;
      const label = isRecord(body) && typeof body.label === "string" ? body.label : null;

      let labels = labelSessions.get(participantId);
      if (!labels) {
        labels = new LabelSession(participantId, now);
        labelSessions.set(participantId, labels);
      }
      const selection = label === null ? labels.clear() : labels.toggle(label);
      await persistence.saveLabelLog(participantId, labels.toCsv());
      res.json({ selection, entries: labels.entries.length });
    }),
  );

  app.get("/participants/:pid/labels.csv", (req, res) => {
    const participantId = req.params.pid;
    const labels = labelSessions.get(participantId) ?? new LabelSession(participantId, now);
    res.type("text/csv").send(labels.toCsv());
  });

  // ─── Processing routes ────────────────────────────────────────────────────────

  app.post(
    "/participants/:pid/runs",
    route(async (req, res) => {
      const participantId = participantParam(req);
      for (const run of runs.values()) {
        if (run.participantId === participantId && run.status === "running") {
          res.status(409).json({ error: `Run ${run.runId} is already running for participant ${participantId}` });
          return;
        }
      }

      const body: unknown = req.body;
      const statsOnly =
        isRecord(body) && typeof body.statsOnly === "boolean" ? body.statsOnly : config.pipeline.statsOnly;
      const pipeline = pipelineFactory({ ...config.pipeline, statsOnly });

      const runId = uuidv4();
      const controller = new AbortController();
      const handle: RunHandle = {
        runId,
        participantId,
        status: "running",
        controller,
        done: Promise.resolve(),
      };
      runs.set(runId, handle);

      handle.done = pipeline
        .run(participantId, {
          runId,
          signal: controller.signal,
          onProgress: (progress) => broadcast({ type: "segment_progress", runId, participantId, progress }),
        })
        .then(
          (result) => {
            handle.status = result.report.aborted ? "aborted" : "complete";
            pruneFinishedRuns();
            broadcast({
              type: "run_complete",
              runId,
              participantId,
              statistics: result.report.statistics,
              aborted: result.report.aborted,
            });
          },
          (err: unknown) => {
            handle.status = "failed";
            pruneFinishedRuns();
            logger.error(`Run ${runId} for participant ${participantId} failed: ${errorMessage(err)}`);
            broadcast({ type: "run_failed", runId, participantId, message: errorMessage(err) });
          },
        );

      res.status(202).json({ runId });
    }),
  );

  app.get("/runs/:runId", (req, res) => {
    const run = runs.get(req.params.runId);
    if (!run) {
      res.status(404).json({ error: `Unknown run ${req.params.runId}` });
      return;
    }
    res.json({ runId: run.runId, participantId: run.participantId, status: run.status });
  });

  app.delete("/runs/:runId", (req, res) => {
    const run = runs.get(req.params.runId);
    if (!run) {
      res.status(404).json({ error: `Unknown run ${req.params.runId}` });
      return;
    }
    if (run.status === "running") {
      run.controller.abort();
      logger.info(`Abort requested for run ${run.runId}`);
    }
    res.status(202).json({ runId: run.runId, status: run.status });
  });

  app.use(errorHandler(logger));

  // ─── WebSocket ────────────────────────────────────────────────────────────────

  wss.on("connection", (ws: WebSocket) => {
    logger.info(`WebSocket client connected (${wss.clients.size} total)`);
    ws.on("message", () => {
      sendMessage(ws, { type: "error", message: "This socket only broadcasts events", recoverable: true });
    });
  });

  /** Drop the oldest finished runs beyond the history limit. Running ones always stay. */
  function pruneFinishedRuns(): void {
    const finished = [...runs.values()].filter((run) => run.status !== "running");
    for (const run of finished.slice(0, Math.max(0, finished.length - finishedRunHistory))) {
      runs.delete(run.runId);
    }
  }

  function recordOnset(participantId: string, gestureIndex: number, gestureName: string): void {
    recorder
      .log({ participantId, gestureIndex, gestureName, timestamp: now().toISOString() })
      .catch((err: unknown) => {
        logger.error(`Failed to record gesture ${gestureIndex} for participant ${participantId}: ${errorMessage(err)}`);
      });
  }

  return {
    app,
    httpServer,
    wss,
    recorder,
    broadcast,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    async close(): Promise<void> {
      for (const session of sessions.values()) session.stop();
      sessions.clear();
      for (const run of runs.values()) {
        if (run.status === "running") run.controller.abort();
      }
      await Promise.all([...runs.values()].map((run) => run.done));

      await new Promise<void>((resolve, reject) => {
        // Close all WebSocket connections
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Wrap an async handler so rejections reach the error middleware. */
function route(handler: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function participantParam(req: Request): string {
  const participantId = req.params.pid;
  if (!PARTICIPANT_ID_PATTERN.test(participantId)) {
    throw new ValidationError(`Invalid participant id "${participantId}"`);
  }
  return participantId;
}

/**
 * Gesture names come from the request body (`{ gestures: [...] }`) or, when
 * absent, from `participant_{pid}_schedule.json` (`{ gesture_sequence: [...] }`).
 */
export async function resolveGestureSequence(
  body: unknown,
  participantId: string,
  schedulesDir: string,
): Promise<string[]> {
  if (isRecord(body) && body.gestures !== undefined) {
    return validateGestureList(body.gestures, "gestures");
  }

  const file = path.resolve(schedulesDir, `participant_${participantId}_schedule.json`);
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (err) {
    if (isNotFound(err)) throw new ValidationError(`No schedule found for participant ${participantId}`);
    throw err;
  }
  let schedule: unknown;
  try {
    schedule = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`Schedule for participant ${participantId} is not valid JSON: ${errorMessage(err)}`);
  }
  return validateGestureList(isRecord(schedule) ? schedule.gesture_sequence : undefined, "gesture_sequence");
}

function validateGestureList(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError(`${field} must be a non-empty array of gesture names`);
  }
  return value.map((name, i) => {
    if (typeof name !== "string" || name.trim() === "") {
      throw new ValidationError(`${field}[${i}] must be a non-empty string`);
    }
    return name.trim();
  });
}

/** Send a typed ServerMessage as JSON over a WebSocket. */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function errorHandler(logger: Logger) {
  return (err: unknown, _req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof ValidationError) {
      res.status(400).json({ error: err.message });
      return;
    }
    // Body parser failures carry a 4xx status
    if (isRecord(err) && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
      res.status(err.status).json({ error: errorMessage(err) });
      return;
    }
    const code = err instanceof SegmenterError ? err.code : "INTERNAL";
    logger.error(`Request failed (${code}): ${errorMessage(err)}`);
    res.status(500).json({ error: errorMessage(err), code });
  };
}
