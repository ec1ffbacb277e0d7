/**
 * Opens the Folio object graph for a command.
 *
 * Commands receive an `OpenFolio` instead of calling `createFolio`
 * directly so tests can hand them an in-memory gateway.
 */

import { createFolio, type Env, type Folio, loadConfig } from "@folio/blog-service";
import type { Logger } from "@folio/protocol";

export type OpenFolio = (logger: Logger) => Folio;

export const openFromEnv =
  (env: Env = process.env): OpenFolio =>
  (logger) =>
    createFolio(loadConfig(env), { logger });
