/**
 * Small fetch helpers shared by the HTTP providers.
 */

/** Abort signal for a request timeout, when one is configured */
export function timeoutSignal(timeoutMs?: number): AbortSignal | undefined {
  return timeoutMs && timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;
}

/**
 * Readable error from a failed response. JSON bodies are searched for the
 * usual `message`/`detail`/`error` fields; anything else is used as text.
 */
export async function readApiError(response: Response): Promise<string> {
  const errorText = await response.text().catch(() => "");
  let errorMessage: string;
  try {
    const errorData: unknown = JSON.parse(errorText);
    errorMessage = pickMessage(errorData) ?? errorText;
  } catch {
    errorMessage = errorText;
  }
  return `API error (${response.status}): ${errorMessage || response.statusText}`;
}

function pickMessage(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null) return undefined;
  for (const key of ["message", "detail", "error"]) {
    const value: unknown = Reflect.get(data, key);
    if (typeof value === "string" && value) return value;
    const nested = pickMessage(value);
    if (nested) return nested;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
