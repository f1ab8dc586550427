// Extract the waitUntil type from the function signature
type WaitUntilFunction = typeof import("@vercel/functions").waitUntil;

type BackgroundTask = Promise<unknown>;

let cachedWaitUntil: WaitUntilFunction | null = null;
let loadWaitUntilPromise: Promise<WaitUntilFunction | null> | null = null;
const pendingTasks = new Set<Promise<void>>();

async function loadWaitUntil(): Promise<WaitUntilFunction | null> {
  if (cachedWaitUntil) {
    return cachedWaitUntil;
  }

  if (!loadWaitUntilPromise) {
    loadWaitUntilPromise = import("@vercel/functions")
      .then((mod) => {
        cachedWaitUntil = mod.waitUntil;
        return cachedWaitUntil;
      })
      .catch((error: unknown) => {
        if (process.env.NODE_ENV !== "production") {
          console.warn("[background-tasks] Failed to load @vercel/functions.waitUntil", error);
        }
        return null;
      });
  }

  return loadWaitUntilPromise;
}

/**
 * Keep a task alive after the response is sent. Rejections are logged here,
 * so callers never see an unhandled rejection.
 */
export function enqueueBackgroundTask(task: BackgroundTask): void {
  const tracked: Promise<void> = task
    .then(() => undefined)
    .catch((error: unknown) => {
      console.error("[background-tasks] Task rejected:", error instanceof Error ? error.stack : String(error));
    })
    .finally(() => {
      pendingTasks.delete(tracked);
    });
  pendingTasks.add(tracked);

  if (cachedWaitUntil) {
    cachedWaitUntil(tracked);
    return;
  }

  loadWaitUntil()
    .then((waitUntilFn) => {
      if (waitUntilFn) {
        waitUntilFn(tracked);
      } else {
        console.warn("[background-tasks] waitUntil not available, task runs without a lifetime extension");
      }
    })
    .catch((error: unknown) => {
      console.error("[background-tasks] Failed to schedule background task", error);
    });
}

/**
 * Resolve once every enqueued task has settled (tests only)
 */
export async function __waitForBackgroundTasks(): Promise<void> {
  while (pendingTasks.size > 0) {
    await Promise.all([...pendingTasks]);
  }
}
