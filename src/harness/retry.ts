export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export type SleepFn = (delayMs: number) => Promise<void>;

export interface WaitOptions {
  sleep?: SleepFn;
  onRetry?: (attempt: number) => void;
}

export function validateRetryPolicy(policy: RetryPolicy): RetryPolicy {
  if (!Number.isInteger(policy.attempts) || policy.attempts <= 0) {
    throw new Error("Invalid retry policy attempts: expected a positive integer.");
  }

  if (!Number.isInteger(policy.delayMs) || policy.delayMs < 0) {
    throw new Error("Invalid retry policy delayMs: expected a non-negative integer.");
  }

  return policy;
}

export async function waitFor(condition: () => boolean, policy: RetryPolicy, options: WaitOptions = {}): Promise<boolean> {
  const { attempts, delayMs } = validateRetryPolicy(policy);
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    if (condition()) {
      return true;
    }

    if (attempt < attempts) {
      options.onRetry?.(attempt);
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }

  return false;
}

export async function defaultSleep(delayMs: number): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, delayMs);
  });
}
