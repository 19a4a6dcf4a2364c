/**
 * ServiceAccountAuth: OAuth2 access tokens for a Google service account
 *
 * Signs a JWT assertion with the service account key and exchanges it for a
 * bearer token. Tokens are cached until shortly before they expire.
 * Credentials are resolved on the first token request, so building the
 * clients never requires credentials to be present.
 */

import { createSign } from "crypto";
import { readFileSync } from "fs";
import type { HttpRequestFn } from "@/types";
import type {
  AccessTokenProvider,
  GoogleOAuth2TokenResponse,
  GoogleServiceAccountCredentials,
  GoogleServiceAccountKeyFile,
} from "@/types/clients/google";
import {
  GOOGLE_API_SCOPES,
  GOOGLE_JWT_EXPIRATION_SECONDS,
  GOOGLE_JWT_GRANT_TYPE,
  GOOGLE_MS_PER_SECOND,
  GOOGLE_OAUTH2_TOKEN_URL,
  GOOGLE_TOKEN_EXPIRY_BUFFER_SECONDS,
} from "@/constants/clients/google";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import * as logger from "@/logger";
import { isPlainObject, normalizePrivateKey } from "@/utils";

export interface ServiceAccountAuthConfig {
  /**
   * Optional explicit credentials (for testing)
   * Defaults to GOOGLE_APPLICATION_CREDENTIALS, then
   * GOOGLE_SERVICE_ACCOUNT_EMAIL / GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY
   */
  credentials?: GoogleServiceAccountCredentials;

  /**
   * Optional HTTP request function (for testing/mocking)
   */
  httpRequest?: HttpRequestFn;

  /**
   * Scopes to request (defaults to every API this tool calls)
   */
  scopes?: readonly string[];
}

/**
 * Read credentials from a service account key file
 */
export function readKeyFile(path: string): GoogleServiceAccountCredentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new Error(
      `Failed to read service account key file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Service account key file ${path} must contain a JSON object`);
  }
  const keyFile: GoogleServiceAccountKeyFile = parsed;
  if (typeof keyFile.client_email !== "string" || !keyFile.client_email) {
    throw new Error(`Service account key file ${path} has no client_email`);
  }
  return {
    clientEmail: keyFile.client_email,
    privateKey: normalizePrivateKey(
      typeof keyFile.private_key === "string" ? keyFile.private_key : undefined,
      `${path} private_key`,
    ),
    projectId: typeof keyFile.project_id === "string" ? keyFile.project_id : undefined,
  };
}

/**
 * Resolve credentials from the environment
 */
export function credentialsFromEnv(env: NodeJS.ProcessEnv = process.env): GoogleServiceAccountCredentials {
  const keyFilePath = env.GOOGLE_APPLICATION_CREDENTIALS;
  if (keyFilePath) {
    return readKeyFile(keyFilePath);
  }

  const clientEmail = env.GOOGLE_SERVICE_ACCOUNT_EMAIL || "";
  if (!clientEmail) {
    throw new Error(
      "Google authentication configuration missing: set GOOGLE_APPLICATION_CREDENTIALS " +
        "or GOOGLE_SERVICE_ACCOUNT_EMAIL and GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY",
    );
  }
  return {
    clientEmail,
    privateKey: normalizePrivateKey(
      env.GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY,
      "GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY",
    ),
    projectId: env.GOOGLE_PROJECT_ID,
  };
}

export class ServiceAccountAuth implements AccessTokenProvider {
  private readonly httpRequest: HttpRequestFn;
  private readonly scopes: readonly string[];
  private credentials: GoogleServiceAccountCredentials | null;

  private accessToken: string | null = null;
  private tokenExpiry = 0;

  constructor(config: ServiceAccountAuthConfig = {}) {
    this.credentials = config.credentials
      ? {
          ...config.credentials,
          privateKey: normalizePrivateKey(config.credentials.privateKey, "credentials.privateKey"),
        }
      : null;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.scopes = config.scopes ?? GOOGLE_API_SCOPES;
  }

  private getCredentials(): GoogleServiceAccountCredentials {
    if (!this.credentials) {
      this.credentials = credentialsFromEnv();
    }
    return this.credentials;
  }

  /**
   * Generate a signed JWT assertion
   */
  createJWT(nowSeconds: number): string {
    const credentials = this.getCredentials();
    const header = { alg: "RS256", typ: "JWT" };
    const payload = {
      iss: credentials.clientEmail,
      scope: this.scopes.join(" "),
      aud: GOOGLE_OAUTH2_TOKEN_URL,
      exp: nowSeconds + GOOGLE_JWT_EXPIRATION_SECONDS,
      iat: nowSeconds,
    };

    const encodedHeader = Buffer.from(JSON.stringify(header)).toString("base64url");
    const encodedPayload = Buffer.from(JSON.stringify(payload)).toString("base64url");

    const signatureInput = `${encodedHeader}.${encodedPayload}`;
    const sign = createSign("RSA-SHA256");
    sign.update(signatureInput);
    sign.end();

    return `${signatureInput}.${sign.sign(credentials.privateKey, "base64url")}`;
  }

  /**
   * Get an access token, refreshing it when missing or about to expire
   */
  async getAccessToken(): Promise<string> {
    const now = Math.floor(Date.now() / GOOGLE_MS_PER_SECOND);

    if (this.accessToken && this.tokenExpiry > now + GOOGLE_TOKEN_EXPIRY_BUFFER_SECONDS) {
      return this.accessToken;
    }

    logger.debug("Requesting new Google OAuth2 access token");

    try {
      const data = await this.httpRequest<GoogleOAuth2TokenResponse>({
        method: "POST",
        url: GOOGLE_OAUTH2_TOKEN_URL,
        form: {
          grant_type: GOOGLE_JWT_GRANT_TYPE,
          assertion: this.createJWT(now),
        },
        idempotent: true,
      });

      if (typeof data.access_token !== "string" || !data.access_token) {
        throw new Error("token response has no access_token");
      }

      this.accessToken = data.access_token;
      this.tokenExpiry = now + data.expires_in;
      logger.debug("Google OAuth2 access token obtained");
      return this.accessToken;
    } catch (error) {
      logger.error("Failed to obtain Google OAuth2 access token", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new Error(
        `Failed to authenticate with Google APIs: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }
}
