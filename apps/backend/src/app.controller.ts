import { Controller, Get } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { IConfig, IPinsvcConfig } from "./config/app.config.js";

@Controller("api")
export class AppController {
  constructor(private readonly configService: ConfigService<IConfig, true>) {}

  /**
   * Health check endpoint
   * Returns the current status
   */
  @Get("health")
  getHealth() {
    return { status: "ok" };
  }

  /**
   * Limits applied to pin list requests
   */
  @Get("config")
  getConfig() {
    const pinsvc = this.configService.get<IPinsvcConfig>("pinsvc");

    return {
      pinsvc: {
        statusConcurrency: pinsvc.statusConcurrency,
        maxCids: pinsvc.maxCids,
      },
    };
  }
}
