import type { LoginState, LoginViewModel } from "../types/login";
import { isCredentialsValid, isSamePhase } from "./loginLogic";

export const projectLoginViewModel = (state: LoginState): LoginViewModel => {
  const isPerformingLogin = state.phase.type === "performing_login";

  return {
    isSpinning: isPerformingLogin,
    isLoginButtonEnabled: isCredentialsValid(state.credentials) && !isPerformingLogin,
    isPasswordHidden: state.isPasswordHidden,
    phase: state.phase,
  };
};

export const isSameViewModel = (a: LoginViewModel, b: LoginViewModel): boolean =>
  a.isSpinning === b.isSpinning &&
  a.isLoginButtonEnabled === b.isLoginButtonEnabled &&
  a.isPasswordHidden === b.isPasswordHidden &&
  isSamePhase(a.phase, b.phase);
