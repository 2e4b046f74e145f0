export type FetchedBody = {
  status: number;
  ok: boolean;
  body: string;
};

/** The timer covers the headers and the whole body. */
export async function fetchWithTimeout(
  input: RequestInfo | URL,
  init: RequestInit & { timeoutMs?: number } = {}
): Promise<FetchedBody> {
  const { timeoutMs = 30000, ...rest } = init;
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(input, { ...rest, signal: controller.signal, cache: "no-store" });
    const body = await res.text();
    return { status: res.status, ok: res.ok, body };
  } finally {
    clearTimeout(t);
  }
}
