export type QuantityRequest = {
  name: string;
  unit: string | null;
};

/**
 * Splits a request such as `"T4 pout/bar Qev/W"` into names with an optional
 * target unit each. Repeated names keep their first occurrence.
 */
export const parseQuantityRequest = (request: string | readonly string[]): QuantityRequest[] => {
  const tokens = typeof request === "string" ? request.split(/\s+/) : request;
  const seen = new Set<string>();
  const parsed: QuantityRequest[] = [];
  tokens
    .map((token) => token.trim())
    .filter((token) => token.length > 0)
    .forEach((token) => {
      const slash = token.indexOf("/");
      const name = slash === -1 ? token : token.slice(0, slash);
      const unit = slash === -1 ? null : token.slice(slash + 1).trim() || null;
      if (!name || seen.has(name)) {
        return;
      }
      seen.add(name);
      parsed.push({ name, unit });
    });
  return parsed;
};
