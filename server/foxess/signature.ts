import { createHash } from "crypto";
import type { FoxessCredentials } from "@shared/schema";

export const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * MD5-Signatur für FoxESS-Requests.
 *
 * Achtung: Die Trennzeichen sind die vier Zeichen `\r\n` als Text, nicht CR/LF.
 * Mit echtem CR/LF lehnt die Cloud die Signatur ab.
 *
 * @param path - URL-Pfad ohne Query-String
 */
export function buildSignature(path: string, token: string, timestamp: number): string {
  const text = `${path}\\r\\n${token}\\r\\n${timestamp}`;
  return createHash("md5").update(text, "utf8").digest("hex");
}

export function credentialToken(credentials: FoxessCredentials): string {
  return credentials.type === "apiKey" ? credentials.apiKey : credentials.accessToken;
}

/**
 * Baut die Header inkl. Signatur. API-Keys gehen als `token`-Header,
 * OAuth2-Access-Tokens als Bearer.
 */
export function buildHeaders(
  path: string,
  credentials: FoxessCredentials,
  now: number = Date.now()
): Record<string, string> {
  const token = credentialToken(credentials);
  const headers: Record<string, string> = {
    lang: "en",
    timestamp: String(now),
    "Content-Type": "application/json",
    signature: buildSignature(path, token, now),
    "User-Agent": USER_AGENT,
    Connection: "close",
  };

  if (credentials.type === "apiKey") {
    headers.token = token;
  } else {
    headers.Authorization = `Bearer ${token}`;
  }

  return headers;
}
