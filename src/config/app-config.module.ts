import { Global, Module } from "@nestjs/common";
import { APP_CONFIG, getAppConfig } from "./app.config";

/**
 * Exposes the typed AppConfig under APP_CONFIG.
 *
 * Must be imported after ConfigModule.forRoot() so .env is already loaded
 * into process.env when the factory runs.
 */
@Global()
@Module({
  providers: [
    {
      provide: APP_CONFIG,
      useFactory: () => getAppConfig(),
    },
  ],
  exports: [APP_CONFIG],
})
export class AppConfigModule {}
