import { describe, expect, it } from "vitest";

import {
  collectCommands,
  createInitialLoginState,
  isCredentialsValid,
  isSameLoginState,
  reduceLoginEvent,
} from "./loginLogic";
import type { APIError, LoginEvent, LoginPhase, LoginState, User } from "../types/login";

const user: User = { userId: "user-1", username: "alice01" };
const apiError: APIError = { message: "Invalid credentials", code: "401" };

const stateIn = (phase: LoginPhase, overrides: Partial<LoginState> = {}): LoginState => ({
  ...createInitialLoginState(),
  credentials: { username: "validUser", password: "longenoughpw1" },
  phase,
  ...overrides,
});

const allEvents: LoginEvent[] = [
  { type: "username_changed", username: "someone" },
  { type: "password_changed", password: "password99" },
  { type: "login_button_tapped" },
  { type: "password_toggled" },
  { type: "error_message_dismissed" },
  { type: "login_request_succeeded", user },
  { type: "login_request_failed", error: apiError },
];

describe("login logic reducer", () => {
  it("starts logged out with empty credentials and a hidden password", () => {
    expect(createInitialLoginState()).toEqual({
      credentials: { username: "", password: "" },
      isPasswordHidden: true,
      phase: { type: "logged_out" },
    });
  });

  it("toggles password visibility without leaving logged_out", () => {
    const state = stateIn({ type: "logged_out" });

    const result = reduceLoginEvent(state, { type: "password_toggled" });

    expect(result.newState).toEqual({ ...state, isPasswordHidden: false });
    expect(result.commands).toEqual([]);
    expect(state.isPasswordHidden).toBe(true);
  });

  it("replaces credentials field by field while logged out", () => {
    const initial = createInitialLoginState();

    const afterUsername = reduceLoginEvent(initial, { type: "username_changed", username: "alice01" }).newState;
    const afterPassword = reduceLoginEvent(afterUsername, { type: "password_changed", password: "secret123" }).newState;

    expect(afterPassword.credentials).toEqual({ username: "alice01", password: "secret123" });
    expect(initial.credentials).toEqual({ username: "", password: "" });
  });

  it("requests exactly one login when the button is tapped", () => {
    const state = stateIn({ type: "logged_out" });

    const result = reduceLoginEvent(state, { type: "login_button_tapped" });

    expect(result.newState.phase).toEqual({ type: "performing_login" });
    expect(result.commands).toEqual([
      { type: "send_login_request", username: "validUser", password: "longenoughpw1" },
    ]);
  });

  it("moves to logged_in or login_failed on feedback while performing login", () => {
    const state = stateIn({ type: "performing_login" });

    const succeeded = reduceLoginEvent(state, { type: "login_request_succeeded", user });
    const failed = reduceLoginEvent(state, { type: "login_request_failed", error: apiError });

    expect(succeeded.newState.phase).toEqual({ type: "logged_in", user });
    expect(succeeded.commands).toEqual([]);
    expect(failed.newState.phase).toEqual({ type: "login_failed", error: apiError });
    expect(failed.commands).toEqual([]);
  });

  it("ignores every other event while performing login", () => {
    const state = stateIn({ type: "performing_login" });
    const ignored = allEvents.filter(
      (event) => event.type !== "login_request_succeeded" && event.type !== "login_request_failed",
    );

    for (const event of ignored) {
      const result = reduceLoginEvent(state, event);
      expect(result.newState).toBe(state);
      expect(result.commands).toEqual([]);
    }
  });

  it("returns to logged_out with credentials kept when the error is dismissed", () => {
    const state = stateIn({ type: "login_failed", error: apiError });

    const result = reduceLoginEvent(state, { type: "error_message_dismissed" });

    expect(result.newState).toEqual({ ...state, phase: { type: "logged_out" } });
    expect(result.commands).toEqual([]);
  });

  it("ignores everything but dismissal after a failed login", () => {
    const state = stateIn({ type: "login_failed", error: apiError });

    for (const event of allEvents.filter((candidate) => candidate.type !== "error_message_dismissed")) {
      expect(reduceLoginEvent(state, event)).toEqual({ newState: state, commands: [] });
    }
  });

  it("treats logged_in as terminal", () => {
    const state = stateIn({ type: "logged_in", user });

    for (const event of allEvents) {
      expect(reduceLoginEvent(state, event).newState).toBe(state);
    }
  });

  it("ignores feedback and dismissal events while logged out", () => {
    const state = stateIn({ type: "logged_out" });
    const unexpected: LoginEvent[] = [
      { type: "error_message_dismissed" },
      { type: "login_request_succeeded", user },
      { type: "login_request_failed", error: apiError },
    ];

    for (const event of unexpected) {
      expect(reduceLoginEvent(state, event)).toEqual({ newState: state, commands: [] });
    }
  });

  it("treats repeated username edits as idempotent", () => {
    const initial = createInitialLoginState();
    const event: LoginEvent = { type: "username_changed", username: "x" };

    const once = reduceLoginEvent(initial, event).newState;
    const twice = reduceLoginEvent(once, event).newState;

    expect(twice).toEqual(once);
    expect(isSameLoginState(once, twice)).toBe(true);
  });

  it("collapses duplicate commands", () => {
    const command = { type: "send_login_request", username: "alice01", password: "secret123" } as const;

    expect(collectCommands([command, { ...command }])).toEqual([command]);
    expect(collectCommands([command, { ...command, password: "other-pass" }])).toHaveLength(2);
  });
});

describe("credential validity", () => {
  it("accepts a long enough username and password", () => {
    expect(isCredentialsValid({ username: "alice01", password: "secret123" })).toBe(true);
  });

  it("rejects usernames of five characters or fewer", () => {
    for (const username of ["", "a", "alice", "ab cd"]) {
      expect(isCredentialsValid({ username, password: "longenoughpw1" })).toBe(false);
    }
  });

  it("requires more than seven password characters", () => {
    expect(isCredentialsValid({ username: "alice01", password: "seven77" })).toBe(false);
    expect(isCredentialsValid({ username: "alice01", password: "eight888" })).toBe(true);
  });

  it("requires at least one letter or digit in the password", () => {
    expect(isCredentialsValid({ username: "alice01", password: "!!!!----" })).toBe(false);
    expect(isCredentialsValid({ username: "alice01", password: "!!!!---é" })).toBe(true);
  });

  it("counts characters rather than UTF-16 units", () => {
    expect(isCredentialsValid({ username: "😀😀😀", password: "secret123" })).toBe(false);
  });

  it("counts a letter and its combining mark as one character", () => {
    const decomposedE = "e\u0301";

    expect(isCredentialsValid({ username: decomposedE.repeat(5), password: "secret123" })).toBe(false);
    expect(isCredentialsValid({ username: decomposedE.repeat(6), password: "secret123" })).toBe(true);
  });

  it("accepts a combining mark as the password's alphanumeric character", () => {
    expect(isCredentialsValid({ username: "alice01", password: "-------\u0301-" })).toBe(true);
  });
});
