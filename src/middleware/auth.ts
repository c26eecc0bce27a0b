import type { FastifyRequest, FastifyReply } from "fastify";
import { UnauthorizedError } from "../errors";
import { apiKeysMatch } from "../utils/apiKey";

/**
 * Extract API key from request headers
 */
function extractApiKey(request: FastifyRequest): string | null {
  const header = request.headers["x-api-key"];
  if (typeof header === "string" && header.length > 0) {
    return header;
  }
  return null;
}

/**
 * Create a preHandler that requires the admin API key
 * Validates the X-API-Key header against the configured ADMIN_API_KEY
 */
export function requireAdmin(adminApiKey: string | undefined) {
  return async (
    request: FastifyRequest,
    _reply: FastifyReply,
  ): Promise<void> => {
    if (!adminApiKey) {
      throw new UnauthorizedError("Admin API key not configured");
    }

    const apiKey = extractApiKey(request);
    if (!apiKey) {
      throw new UnauthorizedError("API key required");
    }

    if (!apiKeysMatch(apiKey, adminApiKey)) {
      throw new UnauthorizedError("Invalid admin API key");
    }
  };
}
