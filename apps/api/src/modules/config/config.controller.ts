import { Controller, Get, Inject } from "@nestjs/common";
import type { PublicSettings } from "@steptrade/shared";
import { toPublicSettings } from "@steptrade/shared";

import { ConfigService } from "./config.service";

@Controller("config")
export class ConfigController {
  constructor(@Inject(ConfigService) private readonly configService: ConfigService) {}

  @Get("public")
  getPublic(): PublicSettings {
    return toPublicSettings(this.configService.load());
  }
}
