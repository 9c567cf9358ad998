import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";

import { ConfigModule } from "../config/config.module";
import { ApiKeyGuard } from "./api-key.guard";

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard
    }
  ]
})
export class SecurityModule {}
