export type {
  APIError,
  Credentials,
  LoginCommand,
  LoginEvent,
  LoginFeedbackEvent,
  LoginPhase,
  LoginRequest,
  LoginResult,
  LoginState,
  LoginUiEvent,
  LoginViewModel,
  LogicResult,
  User,
} from "./types/login";
export {
  collectCommands,
  createInitialLoginState,
  isCredentialsValid,
  isSameLoginState,
  isSamePhase,
  reduceLoginEvent,
} from "./state/loginLogic";
export { isSameViewModel, projectLoginViewModel } from "./state/loginView";
export { toLoginEvent } from "./state/loginInputs";
export type { LoginInputSignal } from "./state/loginInputs";
export { bootstrapLoginModule } from "./state/loginBootstrap";
export type { LoginBootstrapOptions } from "./state/loginBootstrap";
export { createHttpLoginApi } from "./api/loginApi";
export type { LoginApi } from "./api/loginApi";
export { createLoginExecutor } from "./api/loginExecutor";
export type { LoginCommandExecutor, LoginExecutorDependencies } from "./api/loginExecutor";
export { createApiClient } from "./api/client";
export { createLoginStore, subscribeToViewModel } from "./store/loginStore";
export type { LoginStore, LoginStoreDependencies } from "./store/loginStore";
export { useLoginScreen } from "./hooks/useLoginScreen";
export type { LoginScreenBindings } from "./hooks/useLoginScreen";
export { loadLoginConfig } from "./config/login";
export type { LoginConfig } from "./config/login";
export { ConfigError, LoginContractError } from "./utils/errors";
export { createLogger, silentLogger } from "./utils/logger";
export type { Logger } from "./utils/logger";
