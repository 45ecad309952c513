import { Module } from "@nestjs/common";
import { OccupancyClient } from "./occupancy.client";

@Module({
  providers: [OccupancyClient],
  exports: [OccupancyClient],
})
export class OccupancyModule {}
