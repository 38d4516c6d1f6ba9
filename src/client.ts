/**
 * High-level client for the SOLAPI API.
 */

import { ConfigOptions, resolveConfig } from './config';
import { createLogger, Logger } from './logger';
import { SignedRequestClient } from './request';
import { CashAPI } from './resources/cash';
import { MessagesAPI } from './resources/messages';
import { StorageAPI } from './resources/storage';

export interface SolapiClientOptions extends ConfigOptions {
  fetch?: typeof fetch;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export class SolapiClient {
  readonly requester: SignedRequestClient;

  public messages: MessagesAPI;
  public storage: StorageAPI;
  public cash: CashAPI;

  constructor(options: SolapiClientOptions = {}) {
    const { fetch, logger, env, ...configOptions } = options;
    // Priority: explicit parameters > environment variables > defaults
    const config = resolveConfig(configOptions, env);
    const log = logger ?? createLogger({ client: 'solapi' });

    if (!config.apiKey || !config.apiSecret) {
      log.warn('apiKey or apiSecret is empty; requests will be rejected by the API');
    }

    this.requester = new SignedRequestClient(config, { fetch, logger: log });
    this.messages = new MessagesAPI(this.requester);
    this.storage = new StorageAPI(this.requester);
    this.cash = new CashAPI(this.requester);
  }

  get baseUrl(): string {
    return this.requester.buildUrl('');
  }
}
