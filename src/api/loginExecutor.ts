import type { LoginCommand, LoginFeedbackEvent } from "../types/login";
import type { LoginApi } from "./loginApi";
import { DEFAULT_RESULT_DELAY_MS } from "../config/login";
import { LoginContractError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import type { Logger } from "../utils/logger";

type Wait = (ms: number) => Promise<void>;

/** Runs one command and resolves to the feedback event it produced, if any. */
export type LoginCommandExecutor = (command: LoginCommand) => Promise<LoginFeedbackEvent | null>;

export interface LoginExecutorDependencies {
  api: LoginApi;
  resultDelayMs?: number;
  wait?: Wait;
  logger?: Logger;
}

const defaultWait: Wait = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const createLoginExecutor = (deps: LoginExecutorDependencies): LoginCommandExecutor => {
  const resultDelayMs = deps.resultDelayMs ?? DEFAULT_RESULT_DELAY_MS;
  const wait = deps.wait ?? defaultWait;
  const logger = deps.logger ?? createLogger("login-executor");

  return async (command: LoginCommand) => {
    switch (command.type) {
      case "send_login_request": {
        let event: LoginFeedbackEvent;
        try {
          const result = await deps.api.loginUser({ username: command.username, password: command.password });
          event = result.ok
            ? { type: "login_request_succeeded", user: result.user }
            : { type: "login_request_failed", error: result.error };
        } catch (error) {
          throw new LoginContractError("Login API rejected instead of returning a result", error);
        }

        logger.debug(`${command.type} -> ${event.type}`);
        // Results surface after a fixed delay on both paths
        await wait(resultDelayMs);
        return event;
      }
      default:
        return assertNever(command.type);
    }
  };
};

const assertNever = (_command: never): never => {
  throw new Error("Unhandled login command");
};
