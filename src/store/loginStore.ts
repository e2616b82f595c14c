import { createStore } from "zustand/vanilla";
import type { StoreApi } from "zustand/vanilla";

import { createInitialLoginState, isSameLoginState, reduceLoginEvent } from "../state/loginLogic";
import { isSameViewModel, projectLoginViewModel } from "../state/loginView";
import type { LoginCommandExecutor } from "../api/loginExecutor";
import type { LoginCommand, LoginEvent, LoginState, LoginUiEvent, LoginViewModel } from "../types/login";
import { LoginContractError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import type { Logger } from "../utils/logger";

type FatalErrorHandler = (error: LoginContractError) => void;

export interface LoginStore {
  state: LoginState;
  viewModel: LoginViewModel;
  /** Queues a UI event; feedback events are rejected. */
  dispatch: (event: LoginUiEvent) => void;
  /** Resolves once no command is in flight, rejects if one crashed. */
  settle: () => Promise<void>;
}

export interface LoginStoreDependencies {
  executor: LoginCommandExecutor;
  initialState?: LoginState;
  onFatalError?: FatalErrorHandler;
  logger?: Logger;
}

const FEEDBACK_EVENT_TYPES: ReadonlySet<string> = new Set(["login_request_succeeded", "login_request_failed"]);

const isFeedbackEventType = (type: string): boolean => FEEDBACK_EVENT_TYPES.has(type);

// Contract violations crash the process rather than surface as login failures.
const crashOnFatalError: FatalErrorHandler = (error) => {
  setTimeout(() => {
    throw error;
  }, 0);
};

export const createLoginStore = (deps: LoginStoreDependencies): StoreApi<LoginStore> => {
  const initialState = deps.initialState ?? createInitialLoginState();
  const onFatalError = deps.onFatalError ?? crashOnFatalError;
  const logger = deps.logger ?? createLogger("login-store");

  return createStore<LoginStore>((set, get) => {
    const queue: LoginEvent[] = [];
    const inFlight = new Set<Promise<void>>();
    let draining = false;
    let fatalError: LoginContractError | null = null;

    const enqueue = (event: LoginEvent): void => {
      queue.push(event);
      drain();
    };

    // Single consumer: events dispatched while draining wait their turn.
    // A throwing subscriber does not stop the queue; the first error is
    // rethrown to the dispatcher once the queue is empty.
    const drain = (): void => {
      if (draining) {
        return;
      }
      draining = true;
      const errors: unknown[] = [];
      try {
        let event = queue.shift();
        while (event) {
          try {
            processEvent(event);
          } catch (error) {
            errors.push(error);
          }
          event = queue.shift();
        }
      } finally {
        draining = false;
      }
      if (errors.length > 0) {
        throw errors[0];
      }
    };

    const processEvent = (event: LoginEvent): void => {
      const current = get();
      const { newState, commands } = reduceLoginEvent(current.state, event);

      // Commands start before publication so subscribers cannot drop them.
      commands.forEach(schedule);

      if (!isSameLoginState(current.state, newState)) {
        const viewModel = projectLoginViewModel(newState);
        logger.debug(`${event.type}: ${current.state.phase.type} -> ${newState.phase.type}`);
        set(isSameViewModel(current.viewModel, viewModel) ? { state: newState } : { state: newState, viewModel });
      }
    };

    const schedule = (command: LoginCommand): void => {
      const task: Promise<void> = Promise.resolve()
        .then(() => deps.executor(command))
        .then(
          (event) => {
            if (event) {
              deliverFeedback(event);
            }
          },
          (error: unknown) => {
            fail(error);
          },
        )
        .finally(() => {
          inFlight.delete(task);
        });
      inFlight.add(task);
    };

    // Subscriber failures while publishing a result are not command failures.
    const deliverFeedback = (event: LoginEvent): void => {
      try {
        enqueue(event);
      } catch (error) {
        logger.error(`Subscriber failed while publishing ${event.type}`, error);
      }
    };

    const fail = (error: unknown): void => {
      const contractError =
        error instanceof LoginContractError ? error : new LoginContractError("Login command crashed", error);
      fatalError = fatalError ?? contractError;
      logger.error("Command execution violated its contract", contractError);
      onFatalError(contractError);
    };

    return {
      state: initialState,
      viewModel: projectLoginViewModel(initialState),

      dispatch: (event: LoginUiEvent) => {
        if (fatalError) {
          throw fatalError;
        }
        if (isFeedbackEventType(event.type)) {
          throw new Error(`${event.type} can only be produced by command execution`);
        }
        enqueue(event);
      },

      settle: async () => {
        while (inFlight.size > 0) {
          await Promise.all(inFlight);
        }
        if (fatalError) {
          throw fatalError;
        }
      },
    };
  });
};

export const subscribeToViewModel = (
  store: StoreApi<LoginStore>,
  listener: (viewModel: LoginViewModel) => void,
): (() => void) =>
  store.subscribe((current, previous) => {
    if (current.viewModel !== previous.viewModel) {
      listener(current.viewModel);
    }
  });
