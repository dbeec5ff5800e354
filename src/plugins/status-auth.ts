import { timingSafeEqual } from "node:crypto";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { AppConfig } from "../config";
import { errorEnvelope } from "../utils/http-envelope";

export const STATUS_TOKEN_HEADER = "x-fx-sentinel-token";

function constantTimeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);

  if (left.length !== right.length) {
    return false;
  }

  return timingSafeEqual(left, right);
}

function shouldSkipStatusAuth(pathname: string): boolean {
  return pathname === "/api/v1/health" || pathname === "/health";
}

function getRequestPathname(request: FastifyRequest): string {
  return (request.raw.url ?? request.url).split("?")[0] ?? "";
}

/** Without STATUS_API_TOKEN the status API is open; with it, every route but health needs the header. */
export async function validateStatusAuth(
  request: FastifyRequest,
  reply: FastifyReply,
  config: Pick<AppConfig, "statusApiToken">,
): Promise<boolean> {
  if (!config.statusApiToken || shouldSkipStatusAuth(getRequestPathname(request))) {
    return true;
  }

  const rawHeader = request.headers[STATUS_TOKEN_HEADER];
  const header = Array.isArray(rawHeader)
    ? rawHeader[0] ?? ""
    : String(rawHeader ?? "");

  if (!header || !constantTimeEqual(header, config.statusApiToken)) {
    await reply
      .code(401)
      .send(errorEnvelope("STATUS_AUTH_FAILED", "Invalid status API token"));
    return false;
  }

  return true;
}
