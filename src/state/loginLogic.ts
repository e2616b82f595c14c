import type {
  APIError,
  Credentials,
  LoginCommand,
  LoginEvent,
  LoginPhase,
  LoginState,
  LogicResult,
  User,
} from "../types/login";

const MIN_USERNAME_LENGTH = 6;
const MIN_PASSWORD_LENGTH = 8;
const LETTER_MARK_OR_DIGIT = /[\p{L}\p{M}\p{N}]/u;
const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

export const createInitialLoginState = (): LoginState => ({
  credentials: { username: "", password: "" },
  isPasswordHidden: true,
  phase: { type: "logged_out" },
});

// User-perceived characters: a base letter and its combining marks count once.
const characterCount = (value: string): number => Array.from(graphemes.segment(value)).length;

export const isCredentialsValid = ({ username, password }: Credentials): boolean =>
  characterCount(username) >= MIN_USERNAME_LENGTH &&
  characterCount(password) >= MIN_PASSWORD_LENGTH &&
  LETTER_MARK_OR_DIGIT.test(password);

export const reduceLoginEvent = (state: LoginState, event: LoginEvent): LogicResult<LoginState> => {
  switch (state.phase.type) {
    case "logged_out":
      return reduceLoggedOut(state, event);
    case "performing_login":
      return reducePerformingLogin(state, event);
    case "login_failed":
      return reduceLoginFailed(state, event);
    case "logged_in":
      return unchanged(state);
    default:
      return exhaustiveCheck(state.phase);
  }
};

const reduceLoggedOut = (state: LoginState, event: LoginEvent): LogicResult<LoginState> => {
  switch (event.type) {
    case "password_toggled":
      return { newState: { ...state, isPasswordHidden: !state.isPasswordHidden }, commands: [] };
    case "username_changed":
      return {
        newState: { ...state, credentials: { ...state.credentials, username: event.username } },
        commands: [],
      };
    case "password_changed":
      return {
        newState: { ...state, credentials: { ...state.credentials, password: event.password } },
        commands: [],
      };
    case "login_button_tapped":
      return processLoginTapped(state);
    default:
      return unchanged(state);
  }
};

const processLoginTapped = (state: LoginState): LogicResult<LoginState> => {
  const newState: LoginState = {
    ...state,
    phase: { type: "performing_login" },
  };

  const commands = collectCommands([
    {
      type: "send_login_request",
      username: state.credentials.username,
      password: state.credentials.password,
    },
  ]);

  return { newState, commands };
};

const reducePerformingLogin = (state: LoginState, event: LoginEvent): LogicResult<LoginState> => {
  switch (event.type) {
    case "login_request_succeeded":
      return { newState: { ...state, phase: { type: "logged_in", user: event.user } }, commands: [] };
    case "login_request_failed":
      return { newState: { ...state, phase: { type: "login_failed", error: event.error } }, commands: [] };
    default:
      return unchanged(state);
  }
};

const reduceLoginFailed = (state: LoginState, event: LoginEvent): LogicResult<LoginState> => {
  if (event.type === "error_message_dismissed") {
    return { newState: { ...state, phase: { type: "logged_out" } }, commands: [] };
  }
  return unchanged(state);
};

const unchanged = (state: LoginState): LogicResult<LoginState> => ({ newState: state, commands: [] });

/**
 * Drops structurally equal commands so that a batch requested in one
 * transition behaves as a set.
 */
export const collectCommands = (commands: readonly LoginCommand[]): LoginCommand[] =>
  commands.reduce<LoginCommand[]>(
    (unique, command) => (unique.some((seen) => isSameCommand(seen, command)) ? unique : [...unique, command]),
    [],
  );

export const isSameCommand = (a: LoginCommand, b: LoginCommand): boolean =>
  a.type === b.type && a.username === b.username && a.password === b.password;

export const isSameCredentials = (a: Credentials, b: Credentials): boolean =>
  a.username === b.username && a.password === b.password;

const isSameUser = (a: User, b: User): boolean => a.userId === b.userId && a.username === b.username;

const isSameError = (a: APIError, b: APIError): boolean =>
  a.code === b.code && a.message === b.message && a.details === b.details;

export const isSamePhase = (a: LoginPhase, b: LoginPhase): boolean => {
  switch (a.type) {
    case "logged_in":
      return b.type === "logged_in" && isSameUser(a.user, b.user);
    case "login_failed":
      return b.type === "login_failed" && isSameError(a.error, b.error);
    default:
      return a.type === b.type;
  }
};

export const isSameLoginState = (a: LoginState, b: LoginState): boolean =>
  a === b ||
  (isSameCredentials(a.credentials, b.credentials) &&
    a.isPasswordHidden === b.isPasswordHidden &&
    isSamePhase(a.phase, b.phase));

const exhaustiveCheck = (_: never): LogicResult<LoginState> => {
  throw new Error("Unhandled login phase");
};
