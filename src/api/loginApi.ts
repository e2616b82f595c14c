import { isAxiosError } from "axios";
import type { AxiosError, AxiosInstance } from "axios";

import type { APIError, LoginRequest, LoginResult, User } from "../types/login";

const LOGIN_ENDPOINT = "/auth/login";

/**
 * Network collaborator for the login screen. Credential rejections and
 * transport failures resolve to `{ ok: false }`; a rejected promise means the
 * contract itself was broken.
 */
export interface LoginApi {
  loginUser: (request: LoginRequest) => Promise<LoginResult>;
}

export const createHttpLoginApi = (client: AxiosInstance): LoginApi => ({
  loginUser: async (request) => {
    try {
      const response = await client.post<unknown>(LOGIN_ENDPOINT, {
        username: request.username,
        password: request.password,
      });
      return { ok: true, user: parseUser(response.data) };
    } catch (error) {
      if (isAxiosError(error)) {
        return { ok: false, error: mapAxiosError(error) };
      }
      throw error;
    }
  },
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const parseUser = (body: unknown): User => {
  if (isRecord(body) && typeof body.userId === "string" && typeof body.username === "string") {
    return { userId: body.userId, username: body.username };
  }
  throw new TypeError("Login response did not contain a user");
};

const mapAxiosError = (error: AxiosError): APIError => {
  if (!error.response) {
    return {
      message: error.message,
      code: "network",
    };
  }

  const data: unknown = error.response.data;
  const detail = isRecord(data) && typeof data.detail === "string" ? data.detail : undefined;

  return {
    message: detail ?? error.message,
    code: `${error.response.status}`,
    details: data,
  };
};
