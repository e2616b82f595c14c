/**
 * Login Bootstrap - wires configuration, the HTTP login API and the executor
 * into a ready-to-use login store.
 */

import type { StoreApi } from "zustand/vanilla";

import { createApiClient } from "../api/client";
import { createHttpLoginApi } from "../api/loginApi";
import type { LoginApi } from "../api/loginApi";
import { createLoginExecutor } from "../api/loginExecutor";
import { loadLoginConfig } from "../config/login";
import { createLoginStore } from "../store/loginStore";
import type { LoginStore } from "../store/loginStore";
import { createLogger } from "../utils/logger";
import type { Logger } from "../utils/logger";

export interface LoginBootstrapOptions {
  env?: Record<string, string | undefined>;
  api?: LoginApi;
  logger?: Logger;
}

export const bootstrapLoginModule = (options: LoginBootstrapOptions = {}): StoreApi<LoginStore> => {
  const logger = options.logger ?? createLogger("login-bootstrap");
  const config = loadLoginConfig(options.env, logger);

  const api = options.api ?? createHttpLoginApi(createApiClient(config.apiUrl, logger));
  logger.info(options.api ? "Using injected login API" : `Using login API at ${config.apiUrl}`);

  const executor = createLoginExecutor({ api, resultDelayMs: config.resultDelayMs, logger });
  const store = createLoginStore({ executor, logger });
  logger.info("Login store initialized");

  return store;
};
