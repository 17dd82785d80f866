#!/usr/bin/env node
// organize-imports-ignore
import "reflect-metadata"
import { CommandFactory } from "nest-commander"
import { AppModule } from "./app.module"

async function bootstrap() {
  await CommandFactory.run(AppModule, ["log", "error", "warn"])
}

bootstrap().catch((e: unknown) => {
  console.error(e)
  process.exit(1)
})
