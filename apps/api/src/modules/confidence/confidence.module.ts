import { Module } from "@nestjs/common";

import { BaselineModule } from "../baseline/baseline.module";
import { ConfigModule } from "../config/config.module";
import { ConfidenceController } from "./confidence.controller";
import { OpenPriceStore } from "./open-price.store";
import { PriceConfidenceService } from "./price-confidence.service";

@Module({
  imports: [ConfigModule, BaselineModule],
  controllers: [ConfidenceController],
  providers: [OpenPriceStore, PriceConfidenceService]
})
export class ConfidenceModule {}
