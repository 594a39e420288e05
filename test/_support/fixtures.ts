export interface BootstringSample {
  name: string;
  unicode: string;
  punycode: string;
}

export interface DomainSample {
  unicode: string;
  ascii: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isBootstringSamples(value: unknown): value is BootstringSample[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item) =>
        isRecord(item) &&
        typeof item.name === "string" &&
        typeof item.unicode === "string" &&
        typeof item.punycode === "string",
    )
  );
}

export function isDomainSamples(value: unknown): value is DomainSample[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item) => isRecord(item) && typeof item.unicode === "string" && typeof item.ascii === "string",
    )
  );
}
