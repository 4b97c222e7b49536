import "reflect-metadata";
import { ConsoleLogger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import cors from "cors";
import helmet from "helmet";
import { AppModule } from "./app.module.js";
import { resolveLogLevels } from "./common/log-levels.js";
import { toStructuredError } from "./common/logging.js";

/** Logger used for bootstrap/exit paths before Nest app is created or on unhandled rejection. */
const exitLogger = new ConsoleLogger("Main", {
  json: true,
  colors: false,
  logLevels: resolveLogLevels(process.env.LOG_LEVEL),
});

function logErrorAndExit(event: string, message: string, error: unknown): never {
  exitLogger.error({
    event,
    message,
    error: toStructuredError(error),
  });
  process.exit(1);
}

async function bootstrap() {
  const logger = new ConsoleLogger("Main", {
    json: true,
    colors: false,
    logLevels: resolveLogLevels(process.env.LOG_LEVEL),
  });

  const app = await NestFactory.create(AppModule, {
    logger,
  });

  app.enableShutdownHooks();

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: [`'self'`],
          styleSrc: [`'self'`, `'unsafe-inline'`],
          imgSrc: [`'self'`, "data:", "validator.swagger.io"],
          scriptSrc: [`'self'`, `https: 'unsafe-inline'`],
          connectSrc: [`'self'`, `https:`],
        },
      },
    }),
  );

  const allowedOrigins = (process.env.PINSVC_ALLOWED_ORIGINS ?? "")
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);

  app.use(
    cors({
      credentials: true,
      origin: allowedOrigins.length > 0 ? allowedOrigins : false, // Disable CORS if no origins configured
    }),
  );

  const config = new DocumentBuilder()
    .setTitle("Cluster Pinning Service")
    .setDescription("IPFS Pinning Services API backed by a cluster RPC endpoint")
    .setVersion("1.0")
    .addTag("Pins")
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup("api", app, document);

  const portEnvValue = process.env.PINSVC_PORT;
  const port = Number.parseInt(portEnvValue || "9097", 10);
  if (Number.isNaN(port)) {
    throw new Error(`Invalid PINSVC_PORT: ${portEnvValue ?? ""}`);
  }
  const host = process.env.PINSVC_HOST || "127.0.0.1";
  await app.listen(port, host);
  logger.log(`Pinning service is running on ${host}:${port}`);
}

void bootstrap().catch((error: unknown) => logErrorAndExit("bootstrap_failed", "Bootstrap failed", error));

process.on("unhandledRejection", (reason: unknown, _promise: Promise<unknown>) => {
  logErrorAndExit("unhandled_rejection", "Unhandled rejection", reason);
});
