import type { SyncDependencies, SyncOptions } from "@/sync";
import type { SyncEnv } from "./env";
import { LinearClient } from "@/sync/linear/client";
import { GoogleCalendarStore } from "@/sync/calendar/client";
import { getCalendarClient, resolveGoogleCredentials } from "@/sync/calendar/auth";
import { DEFAULT_RETRY_POLICY } from "@/sync/reconcile/retry";

/** Wire the Linear reader and the Google calendar store from validated env. */
export function createDependencies(env: SyncEnv): SyncDependencies {
  const source = new LinearClient(
    { apiKey: env.LINEAR_API_KEY },
    { issueLimit: env.LINEAR_ISSUE_LIMIT, projectLimit: env.LINEAR_PROJECT_LIMIT },
  );

  const credentials = resolveGoogleCredentials({
    keyFile: env.GOOGLE_APPLICATION_CREDENTIALS,
    inlineJson: env.GOOGLE_SERVICE_ACCOUNT_JSON,
  });
  const store = GoogleCalendarStore.fromClient(getCalendarClient(credentials), env.GCAL_CALENDAR_ID);

  return { source, store };
}

export function optionsFromEnv(env: SyncEnv): SyncOptions {
  return {
    dryRun: env.SYNC_DRY_RUN,
    timeZone: env.TIMEZONE,
    windowPaddingDays: env.SEARCH_WINDOW_DAYS,
    retryPolicy: {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: env.SYNC_MAX_ATTEMPTS,
      baseDelayMs: env.SYNC_RETRY_BASE_MS,
    },
  };
}
