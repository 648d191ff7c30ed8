/**
 * Builds the dispatch client selected by `dispatch.strategy`.
 */

import type { DispatchSettings } from "../config/models/config.js";
import type { IDispatchClient } from "./interfaces/IDispatchClient.js";
import { RawEnvelopeDispatchClient } from "./impl/RawEnvelopeDispatchClient.js";
import { RedisListTransport } from "./impl/RedisListTransport.js";
import { HttpQueueClient } from "./impl/HttpQueueClient.js";
import { StructuredDispatchClient } from "./impl/StructuredDispatchClient.js";
import type { Logger } from "../../utils/logger.js";

export function createDispatchClient(settings: DispatchSettings, logger?: Logger): IDispatchClient {
  switch (settings.strategy) {
    case "raw-envelope":
      return new RawEnvelopeDispatchClient(
        new RedisListTransport(settings.brokerUrl, { connectTimeoutMs: settings.timeoutMs, logger }),
        settings,
        { logger }
      );
    case "structured":
      return new StructuredDispatchClient(
        new HttpQueueClient({
          apiUrl: settings.apiUrl,
          username: settings.apiUsername,
          password: settings.apiPassword,
          timeoutMs: settings.timeoutMs,
        }),
        settings,
        { logger }
      );
  }
}
