import { useCallback } from "react";
import { useStore } from "zustand";
import type { StoreApi } from "zustand";

import { toLoginEvent } from "../state/loginInputs";
import type { LoginInputSignal } from "../state/loginInputs";
import type { LoginStore } from "../store/loginStore";
import type { LoginViewModel } from "../types/login";

export interface LoginScreenBindings {
  viewModel: LoginViewModel;
  onUsernameChange: (text: string) => void;
  onPasswordChange: (text: string) => void;
  onLoginPress: () => void;
  onPasswordToggle: () => void;
  onErrorDismiss: () => void;
}

/**
 * Binds a login store to a screen: renders from the view model and feeds
 * every control's signal back as a login event.
 */
export const useLoginScreen = (store: StoreApi<LoginStore>): LoginScreenBindings => {
  const viewModel = useStore(store, (current) => current.viewModel);
  const dispatch = useStore(store, (current) => current.dispatch);

  const emit = useCallback((signal: LoginInputSignal) => dispatch(toLoginEvent(signal)), [dispatch]);

  return {
    viewModel,
    onUsernameChange: useCallback((text: string) => emit({ source: "username_field", text }), [emit]),
    onPasswordChange: useCallback((text: string) => emit({ source: "password_field", text }), [emit]),
    onLoginPress: useCallback(() => emit({ source: "login_button" }), [emit]),
    onPasswordToggle: useCallback(() => emit({ source: "show_password_button" }), [emit]),
    onErrorDismiss: useCallback(() => emit({ source: "alert_dismissed" }), [emit]),
  };
};
