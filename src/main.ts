// organize-imports-ignore
import "reflect-metadata"
import "./sentry"
import { ConsoleLogger, Logger } from "@nestjs/common"
import { NestFactory } from "@nestjs/core"
import type { NestExpressApplication } from "@nestjs/platform-express"
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger"
import { AppModule } from "./app.module"
import { SensorService } from "./modules/sensor/sensor.service"
import otelSDK from "./tracing"

export async function bootstrap() {
  otelSDK.start()

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: new ConsoleLogger({
      json: process.env.LOG_JSON === "true",
      compact: process.env.LOG_COMPACT === "true",
    }),
  })

  app.enableCors()

  const openApiConfig = new DocumentBuilder()
    .setTitle("BusTime Sensors")
    .setVersion("0.1")
    .build()

  const documentFactory = () => SwaggerModule.createDocument(app, openApiConfig)
  SwaggerModule.setup("openapi", app, documentFactory, {
    jsonDocumentUrl: "openapi/json",
  })

  await app.listen(parseInt(process.env.PORT ?? "3000", 10))

  await app.get(SensorService).startPolling()
}

bootstrap().catch((e: unknown) => {
  new Logger("Bootstrap").error(
    `Failed to start: ${e instanceof Error ? e.message : String(e)}`,
    e instanceof Error ? e.stack : undefined,
  )
  process.exit(1)
})
