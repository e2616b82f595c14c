/**
 * HTTP client for the authentication backend.
 */

import axios from "axios";
import type { AxiosError, AxiosInstance } from "axios";

import { createLogger } from "../utils/logger";
import type { Logger } from "../utils/logger";

export const createApiClient = (baseURL: string, logger: Logger = createLogger("api-client")): AxiosInstance => {
  const client = axios.create({
    baseURL,
    headers: {
      "Content-Type": "application/json",
    },
  });

  // Response interceptor: logs network failures, leaves handling to callers
  client.interceptors.response.use(
    (response) => response,
    (error: AxiosError) => {
      if (error.code === "ERR_NETWORK" || !error.response) {
        logger.error("Network error - check if the backend is running and accessible:", {
          url: error.config?.url,
          baseURL: error.config?.baseURL,
          message: error.message,
        });
      }
      return Promise.reject(error);
    },
  );

  return client;
};
