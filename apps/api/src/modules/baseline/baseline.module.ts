import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { BaselineController } from "./baseline.controller";
import { BaselineService } from "./baseline.service";

@Module({
  imports: [ConfigModule],
  controllers: [BaselineController],
  providers: [BaselineService],
  exports: [BaselineService]
})
export class BaselineModule {}
