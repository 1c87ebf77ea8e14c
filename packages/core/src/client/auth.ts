import {
  AuthTokenSchema,
  UserCreatedSchema,
  type UserCreated,
} from "../schemas/cube.js";
import { createHttp, parseCubeUrl, type ClientOptions } from "./base.js";

/** Exchange a username and password for an API token. */
export async function getAuthToken(
  url: string,
  username: string,
  password: string,
  options: ClientOptions = {},
): Promise<string> {
  const http = createHttp(options);
  const { token } = await http.sendJson(
    "POST",
    `${parseCubeUrl(url)}auth-token/`,
    { username, password },
    AuthTokenSchema,
  );
  return token;
}

export interface NewAccount {
  username: string;
  password: string;
  email: string;
}

/** Register a user. Log in afterwards with {@link getAuthToken}. */
export async function createAccount(
  url: string,
  account: NewAccount,
  options: ClientOptions = {},
): Promise<UserCreated> {
  const http = createHttp(options);
  return http.sendJson(
    "POST",
    `${parseCubeUrl(url)}users/`,
    account,
    UserCreatedSchema,
  );
}
