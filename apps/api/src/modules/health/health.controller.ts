import { Controller, Get } from "@nestjs/common";

export type HealthStatus = { ok: true; ts: string; uptimeSec: number };

@Controller("health")
export class HealthController {
  @Get()
  getHealth(): HealthStatus {
    return { ok: true, ts: new Date().toISOString(), uptimeSec: Math.round(process.uptime()) };
  }
}
