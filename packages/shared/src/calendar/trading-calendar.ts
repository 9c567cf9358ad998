import { z } from "zod";

import { KRX_HOLIDAYS } from "./krx-holidays";

export const MARKET_TIME_ZONE = "Asia/Seoul";

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .refine(isCalendarDate, "not a calendar date");

export type NonTradingReason = "WEEKEND" | "HOLIDAY";

export type TradingDayStatus = {
  date: string;
  tradingDay: boolean;
  reason: NonTradingReason | null;
  holidayName: string | null;
};

/** Calendar date of `instant` in the market's time zone, as YYYY-MM-DD. */
export function marketDate(instant: Date = new Date()): string {
  return new Intl.DateTimeFormat("en-CA", {
    timeZone: MARKET_TIME_ZONE,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).format(instant);
}

function weekday(isoDate: string): number {
  return new Date(`${isoDate}T00:00:00Z`).getUTCDay();
}

export function tradingDayStatus(isoDate: string, holidays: Readonly<Record<string, string>> = KRX_HOLIDAYS): TradingDayStatus {
  const date = IsoDateSchema.parse(isoDate);
  const day = weekday(date);

  if (day === 0 || day === 6) {
    return { date, tradingDay: false, reason: "WEEKEND", holidayName: null };
  }

  const holidayName = holidays[date];
  if (holidayName !== undefined) {
    return { date, tradingDay: false, reason: "HOLIDAY", holidayName };
  }

  return { date, tradingDay: true, reason: null, holidayName: null };
}

export function isTradingDay(isoDate: string): boolean {
  return tradingDayStatus(isoDate).tradingDay;
}
