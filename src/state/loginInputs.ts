import type { LoginUiEvent } from "../types/login";

/** Raw signals emitted by the login screen's controls. */
export type LoginInputSignal =
  | { source: "username_field"; text: string }
  | { source: "password_field"; text: string }
  | { source: "login_button" }
  | { source: "show_password_button" }
  | { source: "alert_dismissed" };

export const toLoginEvent = (signal: LoginInputSignal): LoginUiEvent => {
  switch (signal.source) {
    case "username_field":
      return { type: "username_changed", username: signal.text };
    case "password_field":
      return { type: "password_changed", password: signal.text };
    case "login_button":
      return { type: "login_button_tapped" };
    case "show_password_button":
      return { type: "password_toggled" };
    case "alert_dismissed":
      return { type: "error_message_dismissed" };
    default:
      return assertNever(signal);
  }
};

const assertNever = (_signal: never): LoginUiEvent => {
  throw new Error("Unhandled login input signal");
};
