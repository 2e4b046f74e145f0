const buckets = new Map<string, { count: number; resetAt: number }>();

export function rateLimit(ip: string, { limit, windowMs }: { limit: number; windowMs: number }) {
  const now = Date.now();
  const b = buckets.get(ip);

  if (!b || now > b.resetAt) {
    pruneExpired(now);
    buckets.set(ip, { count: 1, resetAt: now + windowMs });
    return { ok: true, remaining: limit - 1 };
  }

  if (b.count >= limit) return { ok: false, remaining: 0 };

  b.count += 1;
  buckets.set(ip, b);
  return { ok: true, remaining: limit - b.count };
}

function pruneExpired(now: number) {
  if (buckets.size < 1000) return;
  for (const [key, bucket] of buckets) {
    if (now > bucket.resetAt) buckets.delete(key);
  }
}

export function clientIp(req: Request) {
  const forwarded = req.headers.get("x-forwarded-for");
  const first = forwarded?.split(",")[0]?.trim();
  return first || req.headers.get("x-real-ip") || "local";
}

export function resetRateLimits() {
  buckets.clear();
}
