// ============================================================================
// src/libs/http.ts
// ----------------------------------------------------------------------------
// HTTP-Hilfsfunktionen (Logging, Keys, Metriken)
// ============================================================================
import type { FastifyRequest } from "fastify";

/** Liefert eine stabile Routen-ID (für Logs/Keys/Metriken). */
export function getRouteId(req: FastifyRequest): string {
  return req.routeOptions.url ?? req.raw.url?.split("?")[0] ?? "unknown";
}

/** Ermittelt, ob die Anfrage einen Health-Endpoint adressiert. */
export function isHealthPath(req: FastifyRequest): boolean {
  const url = (req.raw.url ?? "").split("?")[0];
  return url === "/health" || url.startsWith("/health/");
}

/** Künstliche Verzögerung mit Jitter (Login-Fehlerpfad). */
export async function delayWithJitter(minMs: number, maxMs: number): Promise<void> {
  if (maxMs <= 0) return;
  const jitter = Math.floor(Math.random() * (maxMs - minMs + 1));
  await new Promise((resolve) => setTimeout(resolve, minMs + jitter));
}
