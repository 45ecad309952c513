import { Controller, Get } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { AppService, ServiceInfo } from "./app.service";

@ApiTags("root")
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  @ApiOperation({
    summary: "Service info",
    description: "Liveness check with service version, storage backend and branches",
  })
  @ApiResponse({ status: 200, description: "Service is up" })
  getRoot(): ServiceInfo {
    return this.appService.getInfo();
  }
}
