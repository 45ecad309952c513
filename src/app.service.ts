import { Inject, Injectable, Logger, OnModuleInit } from "@nestjs/common";
import axios from "axios";
import { APP_CONFIG, AppConfig } from "./config/app.config";
import { BRANCH_NAMES, BranchName } from "./branches/branch-registry";
import { ReadingsService } from "./readings/readings.service";
import { describeError } from "./common/errors/ingestion.error";
import * as packageJson from "../package.json";

export const METADATA_PROJECT_URL =
  "http://metadata.google.internal/computeMetadata/v1/project/project-id";

export interface ServiceInfo {
  service: string;
  version: string;
  projectId: string | null;
  storage: "memory" | "database";
  branches: readonly BranchName[];
  endpoints: string[];
}

@Injectable()
export class AppService implements OnModuleInit {
  private readonly logger = new Logger(AppService.name);
  private projectId: string | null;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly readingsService: ReadingsService,
  ) {
    this.projectId = config.projectId;
  }

  /**
   * Falls back to the GCE metadata server when GOOGLE_CLOUD_PROJECT is
   * not set. Outside Google Cloud the lookup fails and the id stays null.
   */
  async onModuleInit(): Promise<void> {
    if (this.projectId) return;

    try {
      const response = await axios.get<string>(METADATA_PROJECT_URL, {
        headers: { "Metadata-Flavor": "Google" },
        responseType: "text",
        timeout: 2000,
      });
      this.projectId = String(response.data).trim() || null;
      this.logger.log(`Detected project id ${this.projectId} from metadata server`);
    } catch (error) {
      this.logger.warn(
        `Unable to detect project id from GOOGLE_CLOUD_PROJECT or metadata server: ${describeError(error)}`,
      );
    }
  }

  getInfo(): ServiceInfo {
    return {
      service: packageJson.name,
      version: packageJson.version,
      projectId: this.projectId,
      storage: this.readingsService.backend,
      branches: BRANCH_NAMES,
      endpoints: [
        "GET /branches",
        "POST /branches/store",
        "GET /attendance",
        "POST /attendance/store",
        "GET /api",
      ],
    };
  }
}
