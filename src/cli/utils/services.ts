/**
 * Builds the register client and object store from the job configuration
 */

import { loadConfig, type AppConfig } from "../../config.js";
import { RegisterClient } from "../../scraper/client.js";
import { S3DocumentStore } from "../../store/s3-store.js";

export interface CliServices {
  config: AppConfig;
  source: RegisterClient;
  store: S3DocumentStore;
}

export function createServices(configPath?: string): CliServices {
  const config = loadConfig(configPath);

  return {
    config,
    source: new RegisterClient(config.register),
    store: S3DocumentStore.fromConfig(config.objectStore, config.bucket),
  };
}
