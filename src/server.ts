// src/server.ts
import express, { Express, Request, NextFunction, Response } from "express";
import cors from "cors";
import crypto from "crypto";
import helmet from "helmet";
import swaggerUi from "swagger-ui-express";
import { buildSwaggerSpec } from "./config/swagger";
import { loadAppConfig, type AppConfig } from "./config/config";
import { connectMongo, disconnectMongo, pingStatus, type PingStatus } from "./config/mongo";
import { requireInternalKey } from "./middleware/requireInternalKey";
import { errorHandler, notFound } from "./middleware/errorHandler";
import { MongoQuizStore } from "./store/mongoQuizStore";
import type { QuizStore } from "./store/quizStore";
import { initDatabase } from "./services/questionario.service";
import { SessionRegistry } from "./services/sessionRegistry";
import type { PracticeSession } from "./services/practice.service";
import type { ExamSession } from "./services/exam.service";
import { questionariosRouter } from "./routes/questionarios";
import { questoesRouter } from "./routes/questoes";
import { importRouter } from "./routes/import";
import { practiceRouter } from "./routes/practice";
import { examsRouter } from "./routes/exams";
import { configureLogger, logger } from "./utils/logger";

function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
  // Accept upstream ID if provided
  const incoming = req.header("x-request-id") || req.header("x-correlation-id");
  const id = incoming?.trim() || crypto.randomUUID();

  req.id = id;
  res.setHeader("x-request-id", id);

  next();
}

export type AppDeps = {
  store: QuizStore;
  config: AppConfig;
  healthCheck: (refresh: boolean) => Promise<PingStatus>;
  practiceSessions?: SessionRegistry<PracticeSession>;
  examSessions?: SessionRegistry<ExamSession>;
};

export function createApp(deps: AppDeps): Express {
  const app = express();
  const practiceSessions = deps.practiceSessions ?? new SessionRegistry<PracticeSession>("Practice session");
  const examSessions = deps.examSessions ?? new SessionRegistry<ExamSession>("Exam");

  // 0) Proxy awareness (needed for correct req.ip behind a PaaS router)
  if (deps.config.trustProxy) {
    app.set("trust proxy", 1);
  }

  // 1) Request correlation id early
  app.use(requestIdMiddleware);

  // 2) Security headers early
  app.use(helmet());

  // 3) CORS early
  app.use(
    cors({
      origin: deps.config.corsOrigin,
      credentials: true,
    })
  );
  app.use(express.json({ limit: "2mb" }));

  app.use("/api/docs", swaggerUi.serve, swaggerUi.setup(buildSwaggerSpec(deps.config.publicBaseUrl)));

  app.get("/api/health", async (req, res, next) => {
    try {
      const mongo = await deps.healthCheck(req.query.refresh === "true");
      res.status(mongo.ok ? 200 : 503).json({ status: mongo.ok ? "ok" : "degraded", mongo });
    } catch (err) {
      next(err);
    }
  });

  app.use("/api/v1", requireInternalKey(deps.config.internalApiKey));

  app.use("/api/v1/questionarios", questionariosRouter(deps.store));
  app.use("/api/v1/questoes", questoesRouter(deps.store));
  app.use("/api/v1/import", importRouter(deps.store));
  app.use("/api/v1/practice", practiceRouter(deps.store, practiceSessions));
  app.use("/api/v1/exams", examsRouter(deps.store, examSessions));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}

export async function startServer() {
  const config = loadAppConfig();
  configureLogger({ level: config.logLevel, dir: config.logDir });

  // 1) validate + connect first; a ConfigurationError stops here
  await connectMongo({ secretsPath: config.secretsFile });

  const store = new MongoQuizStore();
  await initDatabase(store);

  const app = createApp({
    store,
    config,
    healthCheck: (refresh) => pingStatus({ refresh }),
  });

  const server = app.listen(config.port, () => {
    logger.info(`API listening on http://localhost:${config.port}`);
    logger.info(`Swagger UI at http://localhost:${config.port}/api/docs`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received. Shutting down...`);
    server.close(() => {
      disconnectMongo()
        .then(() => {
          logger.info("Server closed.");
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error("Error while disconnecting MongoDB", { error: String(err) });
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  return app;
}
