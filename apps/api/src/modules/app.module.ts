import { Module } from "@nestjs/common";

import { BaselineModule } from "./baseline/baseline.module";
import { CalendarModule } from "./calendar/calendar.module";
import { ConfidenceModule } from "./confidence/confidence.module";
import { ConfigPublicModule } from "./config/config.public.module";
import { HealthModule } from "./health/health.module";
import { OrderConditionsModule } from "./order-conditions/order-conditions.module";
import { SecurityModule } from "./security/security.module";
import { StepManagerModule } from "./step-manager/step-manager.module";

@Module({
  imports: [
    SecurityModule,
    HealthModule,
    ConfigPublicModule,
    BaselineModule,
    StepManagerModule,
    ConfidenceModule,
    OrderConditionsModule,
    CalendarModule
  ]
})
export class AppModule {}
