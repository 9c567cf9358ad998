import { Controller, Get, Query } from "@nestjs/common";
import type { TradingDayStatus } from "@steptrade/shared";
import { IsoDateSchema, marketDate, tradingDayStatus } from "@steptrade/shared";

@Controller("calendar")
export class CalendarController {
  @Get("trading-day")
  getTradingDay(@Query("date") date?: string): TradingDayStatus {
    return tradingDayStatus(date === undefined ? marketDate() : IsoDateSchema.parse(date));
  }
}
