import { existsSync } from "fs";
import { google, type calendar_v3 } from "googleapis";
import { ConfigError, errorMessage } from "@/sync/errors";
import { serviceAccountSchema, type GoogleCredentials } from "@/sync/types/api";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("google-auth");

const CALENDAR_SCOPE = "https://www.googleapis.com/auth/calendar";

/**
 * Resolve service-account credentials. A key file path that exists wins over
 * inline JSON; inline JSON is validated before it reaches the Google client.
 */
export function resolveGoogleCredentials(source: {
  keyFile?: string;
  inlineJson?: string;
}): GoogleCredentials {
  if (source.keyFile && existsSync(source.keyFile)) {
    return { keyFile: source.keyFile };
  }
  if (source.keyFile) {
    log.warn("GOOGLE_APPLICATION_CREDENTIALS does not point to a file", { path: source.keyFile });
  }

  if (source.inlineJson) {
    let raw: unknown;
    try {
      raw = JSON.parse(source.inlineJson);
    } catch (error) {
      throw new ConfigError(`Invalid GOOGLE_SERVICE_ACCOUNT_JSON: ${errorMessage(error)}`);
    }
    const parsed = serviceAccountSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
      throw new ConfigError(`Invalid GOOGLE_SERVICE_ACCOUNT_JSON: ${issues}`);
    }
    return { serviceAccount: parsed.data };
  }

  throw new ConfigError(
    "Missing Google credentials: set GOOGLE_APPLICATION_CREDENTIALS (path) or GOOGLE_SERVICE_ACCOUNT_JSON (content)",
  );
}

export function getCalendarClient(credentials: GoogleCredentials): calendar_v3.Calendar {
  const auth =
    "keyFile" in credentials
      ? new google.auth.GoogleAuth({ keyFile: credentials.keyFile, scopes: [CALENDAR_SCOPE] })
      : new google.auth.GoogleAuth({
          credentials: {
            client_email: credentials.serviceAccount.client_email,
            private_key: credentials.serviceAccount.private_key,
          },
          scopes: [CALENDAR_SCOPE],
        });
  return google.calendar({ version: "v3", auth });
}
