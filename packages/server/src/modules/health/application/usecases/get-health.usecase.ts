import type { HealthResponse } from "../../../../types.js";

export const SERVER_VERSION = "0.1.0";

export function getHealthUsecase(): HealthResponse {
  return {
    status: "ok",
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
    version: SERVER_VERSION,
  };
}
