import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { OrderConditionController } from "./order-condition.controller";
import { OrderConditionService } from "./order-condition.service";

@Module({
  imports: [ConfigModule],
  controllers: [OrderConditionController],
  providers: [OrderConditionService]
})
export class OrderConditionsModule {}
