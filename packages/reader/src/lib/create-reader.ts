/**
 * Wire a CardReaderSession from the loaded configuration
 */

import type { Dispatcher } from "undici";
import { createLogger, type CardTransport } from "@felica-remote/shared";

import { CardReaderSession, type CardReaderOptions } from "./card-reader-session.js";
import type { ReaderConfig } from "./config-manager.js";
import { RelayClient } from "./relay-client.js";

export type CreateReaderOptions = Omit<
  CardReaderOptions,
  "transport" | "relay" | "exchangeTimeoutMs" | "logger"
> & {
  dispatcher?: Dispatcher;
};

export function createCardReader(
  config: ReaderConfig,
  transport: CardTransport,
  options: CreateReaderOptions = {},
): CardReaderSession {
  const { dispatcher, ...readerOptions } = options;
  const relay = new RelayClient({
    baseUrl: config.authServerUrl,
    timeoutMs: config.httpTimeoutMs,
    endpoints: config.endpoints,
    dispatcher,
    logger: createLogger("reader:relay", config.logLevel),
  });
  return new CardReaderSession({
    ...readerOptions,
    transport,
    relay,
    exchangeTimeoutMs: config.exchangeTimeoutMs,
    logger: createLogger("reader:card", config.logLevel),
  });
}
