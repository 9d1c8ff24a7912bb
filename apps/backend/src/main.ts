import "reflect-metadata";
import "dotenv/config";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { NestExpressApplication } from "@nestjs/platform-express";
import { readFileSync } from "fs";
import { AppModule } from "./app.module";
import { loadServerConfig } from "./config/app-config";

const logger = new Logger("Bootstrap");

async function bootstrap() {
  const server = loadServerConfig(process.env);

  const httpsOptions = server.https
    ? {
        cert: readFileSync(server.https.certPath),
        key: readFileSync(server.https.keyPath),
      }
    : undefined;

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    httpsOptions,
  });

  if (server.trustProxy) {
    // req.ip feeds the audit client_ip.
    app.set("trust proxy", true);
  }

  app.setGlobalPrefix("api");

  if (server.corsOrigins.length > 0) {
    app.enableCors({ origin: server.corsOrigins });
    logger.log(`CORS enabled for origins: ${server.corsOrigins.join(", ")}`);
  }

  await app.listen(server.port);

  const protocol = server.https ? "https" : "http";
  logger.log(`Record API available at: ${protocol}://localhost:${server.port}/api`);
}

bootstrap().catch((error: unknown) => {
  logger.error(
    `Startup failed: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
