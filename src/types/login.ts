export interface Credentials {
  username: string;
  password: string;
}

export interface User {
  userId: string;
  username: string;
}

export interface APIError {
  message: string;
  code: string;
  details?: unknown;
}

export type LoginPhase =
  | { type: "logged_out" }
  | { type: "performing_login" }
  | { type: "logged_in"; user: User }
  | { type: "login_failed"; error: APIError };

export interface LoginState {
  credentials: Credentials;
  isPasswordHidden: boolean;
  phase: LoginPhase;
}

export type LoginUiEvent =
  | { type: "username_changed"; username: string }
  | { type: "password_changed"; password: string }
  | { type: "login_button_tapped" }
  | { type: "password_toggled" }
  | { type: "error_message_dismissed" };

// Produced only by command execution, never by the UI.
export type LoginFeedbackEvent =
  | { type: "login_request_succeeded"; user: User }
  | { type: "login_request_failed"; error: APIError };

export type LoginEvent = LoginUiEvent | LoginFeedbackEvent;

export type LoginCommand = { type: "send_login_request"; username: string; password: string };

export interface LogicResult<T> {
  newState: T;
  commands: readonly LoginCommand[];
}

export interface LoginViewModel {
  isSpinning: boolean;
  isLoginButtonEnabled: boolean;
  isPasswordHidden: boolean;
  phase: LoginPhase;
}

export interface LoginRequest {
  username: string;
  password: string;
}

export type LoginResult = { ok: true; user: User } | { ok: false; error: APIError };
