/**
 * Platform Module
 *
 * @module
 */

import type { PlatformConfig } from "../../utils/validation.js";
import { ConfigurationError } from "../errors.js";
import type { IPlatformClient } from "../interfaces/IPlatformClient.js";
import { FixturePlatformClient } from "./fixture-platform-client.js";
import { HttpPlatformClient } from "./http-platform-client.js";

export * from "./fixture-platform-client.js";
export * from "./http-platform-client.js";

/**
 * Fixtures win over the API when both are configured.
 *
 * @throws ConfigurationError if neither is configured
 */
export function createPlatformClient(config: PlatformConfig): IPlatformClient {
  if (config.fixturesPath) {
    return FixturePlatformClient.fromFile(config.fixturesPath);
  }
  if (config.baseUrl) {
    return new HttpPlatformClient({ baseUrl: config.baseUrl, token: config.token, timeoutMs: config.timeoutMs });
  }
  throw new ConfigurationError("No platform configured: set platform.baseUrl (PLATFORM_BASE_URL) or platform.fixturesPath");
}
