import { Controller, Get } from "@nestjs/common";

@Controller("health")
export class HealthController {
  @Get()
  getHealth(): { ok: true; ts: string } {
    return { ok: true, ts: new Date().toISOString() };
  }
}
