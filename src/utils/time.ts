export function nowUtcIsoSeconds(): string {
  const iso = new Date().toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

export type Clock = () => string;

export const systemClock: Clock = nowUtcIsoSeconds;
