/**
 * Google OAuth — client construction and the token file.
 *
 * Tokens live as JSON in `<home>/google-token.json`. The client persists
 * refreshed tokens back to the file, keeping the stored refresh token when
 * Google omits it from a refresh response.
 */

import { promises as fs } from "fs";
import path from "path";
import { google, type Auth } from "googleapis";
import type { ILogger } from "@taskminder/shared/logging";
import type { CalendarConfig } from "../core/config.js";
import { CalendarError } from "../core/errors.js";
import { createComponentLogger } from "../logging.js";

export const CALENDAR_SCOPES = ["https://www.googleapis.com/auth/calendar.events"];

// ============================================
// TOKEN FILE
// ============================================

/** Narrow parsed JSON to the credential fields we store. */
export function parseStoredTokens(value: unknown): Auth.Credentials | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;

  const tokens: Auth.Credentials = {};
  for (const [key, field] of Object.entries(value)) {
    switch (key) {
      case "access_token":
      case "refresh_token":
      case "token_type":
      case "id_token":
      case "scope":
        if (typeof field === "string") tokens[key] = field;
        break;
      case "expiry_date":
        if (typeof field === "number") tokens.expiry_date = field;
        break;
    }
  }

  return tokens.access_token || tokens.refresh_token ? tokens : null;
}

export async function readTokenFile(tokenPath: string): Promise<Auth.Credentials | null> {
  let raw: string;
  try {
    raw = await fs.readFile(tokenPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw new CalendarError(`Could not read ${tokenPath}`, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CalendarError(`${tokenPath} is not valid JSON; run 'auth' again`, error);
  }
  return parseStoredTokens(parsed);
}

export async function writeTokenFile(tokenPath: string, tokens: Auth.Credentials): Promise<void> {
  await fs.mkdir(path.dirname(tokenPath), { recursive: true });
  await fs.writeFile(tokenPath, JSON.stringify(tokens, null, 2), { encoding: "utf-8", mode: 0o600 });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

// ============================================
// CLIENT
// ============================================

export function createOAuthClient(config: CalendarConfig): Auth.OAuth2Client {
  return new google.auth.OAuth2(config.clientId, config.clientSecret, config.redirectUri);
}

/**
 * OAuth client loaded with the stored tokens. Throws CalendarError when no
 * token file exists yet.
 */
export async function getAuthorizedClient(
  config: CalendarConfig,
  log: ILogger = createComponentLogger("calendar"),
): Promise<Auth.OAuth2Client> {
  const stored = await readTokenFile(config.tokenPath);
  if (!stored) {
    throw new CalendarError("Google Calendar is not authorized yet. Run 'auth' first.");
  }

  const client = createOAuthClient(config);
  client.setCredentials(stored);

  client.on("tokens", tokens => {
    const merged: Auth.Credentials = {
      ...stored,
      ...tokens,
      refresh_token: tokens.refresh_token ?? stored.refresh_token,
    };
    writeTokenFile(config.tokenPath, merged)
      .then(() => log.debug("Stored refreshed Google tokens"))
      .catch(error => log.error("Failed to store refreshed Google tokens", error));
  });

  return client;
}

// ============================================
// CONSENT FLOW
// ============================================

export function buildConsentUrl(client: Auth.OAuth2Client): string {
  return client.generateAuthUrl({
    access_type: "offline",
    prompt: "consent",
    scope: CALENDAR_SCOPES,
  });
}

/** Exchange an authorization code and store the resulting tokens. */
export async function exchangeCode(
  config: CalendarConfig,
  client: Auth.OAuth2Client,
  code: string,
): Promise<void> {
  let tokens: Auth.Credentials;
  try {
    ({ tokens } = await client.getToken(code.trim()));
  } catch (error) {
    throw new CalendarError("Google rejected the authorization code", error);
  }
  await writeTokenFile(config.tokenPath, tokens);
}
