#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import type { Logger } from 'pino';
import { loadConfig, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { loadCatalog, loadDiscountRules } from './domain/catalog.js';
import { validateConfiguration } from './domain/services/ConfigValidator.js';
import { createSession, type ShoppingSession } from './domain/session.js';
import type { RawCatalog, RawDiscountRules } from './domain/models.js';
import { MenuController } from './cli/MenuController.js';
import { ReadlineConsole } from './infrastructure/io/ReadlineConsole.js';
import type { IConsoleIO } from './infrastructure/io/IConsoleIO.js';
import { STORE_CATALOG, STORE_DISCOUNT_RULES } from './infrastructure/catalog/storeCatalog.js';

export interface BuildOptions {
  config?: AppConfig;
  logger?: Logger;
  catalog?: RawCatalog;
  discountRules?: RawDiscountRules;
}

// validates the store data and wires one session; warnings never block startup
export function buildSession(options: BuildOptions = {}): ShoppingSession {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config.logLevel);
  const rawCatalog = options.catalog ?? STORE_CATALOG;
  const rawRules = options.discountRules ?? STORE_DISCOUNT_RULES;

  for (const warning of validateConfiguration(rawCatalog, rawRules)) {
    logger.warn(warning);
  }

  return createSession({
    catalog: loadCatalog(rawCatalog),
    discountRules: loadDiscountRules(rawRules),
    logger,
    currency: config.currencySymbol,
    maxQuantity: config.maxQuantity,
  });
}

export async function runApp(io: IConsoleIO, session: ShoppingSession): Promise<void> {
  const controller = new MenuController(io, session);
  try {
    await controller.run();
  } finally {
    io.close();
  }
}

async function start() {
  const session = buildSession();
  const io = new ReadlineConsole();

  try {
    await runApp(io, session);
    process.exit(0);
  } catch (err) {
    session.logger.error({ err }, 'session aborted');
    process.exit(1);
  }
}

function isEntryPoint(argvPath: string | undefined): boolean {
  if (!argvPath || !existsSync(argvPath)) return false;
  return import.meta.url === pathToFileURL(realpathSync(argvPath)).href;
}

// Start if run directly
if (isEntryPoint(process.argv[1])) {
  void start();
}
