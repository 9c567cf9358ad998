import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { StepManagerController } from "./step-manager.controller";
import { StepManagerService } from "./step-manager.service";

@Module({
  imports: [ConfigModule],
  controllers: [StepManagerController],
  providers: [StepManagerService]
})
export class StepManagerModule {}
