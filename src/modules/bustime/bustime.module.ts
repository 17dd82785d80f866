import { Module } from "@nestjs/common"
import { BusTimeClientFactory } from "./bustime-client.factory"

@Module({
  providers: [BusTimeClientFactory],
  exports: [BusTimeClientFactory],
})
export class BusTimeModule {}
