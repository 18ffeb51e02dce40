export function envValue(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const cleaned = value.replace(/^\uFEFF/, "").trim();
  return cleaned.length ? cleaned : undefined;
}

export function envNumber(value: string | undefined, fallback: number): number {
  const cleaned = envValue(value);
  if (cleaned === undefined) {
    return fallback;
  }

  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function resolveSsl(connectionString: string, sslMode: string | undefined) {
  if (sslMode === "disable") {
    return false;
  }

  const requiresSsl = connectionString.includes("sslmode=require") || sslMode === "require";
  if (!requiresSsl) {
    return false;
  }

  return {
    rejectUnauthorized: false
  };
}
