import { Test, TestingModule } from "@nestjs/testing";
import { NestExpressApplication } from "@nestjs/platform-express";
import axios, { AxiosInstance } from "axios";
import { AppConfigModule } from "../../src/config/app-config.module";
import { APP_CONFIG, AppConfig } from "../../src/config/app.config";
import { ReadingsModule } from "../../src/readings/readings.module";
import { AppController } from "../../src/app.controller";
import { AppService } from "../../src/app.service";
import { configureApp } from "../../src/app.setup";
import { buildTestConfig } from "../fixtures/config.fixtures";

export type UpstreamRoute = (url: string) => Promise<{ data: unknown }>;

/**
 * Creates the HTTP app on the memory backend with the vendor API replaced
 * by `route`, which receives every URL the client requests.
 *
 * @returns Initialized application (same setup as production)
 */
export async function createTestApp(
  route: UpstreamRoute,
  overrides: Partial<AppConfig> = {},
): Promise<NestExpressApplication> {
  const upstream = { get: jest.fn((url: string) => route(url)) };
  jest
    .spyOn(axios, "create")
    .mockReturnValue(upstream as unknown as AxiosInstance);

  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppConfigModule, ReadingsModule.forRoot({ backend: "memory" })],
    controllers: [AppController],
    providers: [AppService],
  })
    .overrideProvider(APP_CONFIG)
    .useValue(buildTestConfig(overrides))
    .compile();

  const app = moduleFixture.createNestApplication<NestExpressApplication>({
    logger: false,
  });
  configureApp(app);
  await app.init();

  return app;
}

/**
 * Cleanup helper to close the app and restore the axios factory
 */
export async function closeTestApp(app?: NestExpressApplication): Promise<void> {
  if (app) {
    await app.close();
  }
  jest.restoreAllMocks();
}
