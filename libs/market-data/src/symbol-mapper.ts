export const normalizeSymbol = (symbol: string): string => symbol.trim().toUpperCase();

/**
 * Qualifies a bare ticker with the configured exchange suffix. Symbols that
 * already carry an exchange suffix or are indices (`^NSEI`) are kept as-is.
 */
export const toExchangeSymbol = (symbol: string, suffix: string): string => {
  const normalized = normalizeSymbol(symbol);
  if (!normalized) return normalized;
  if (normalized.startsWith('^') || normalized.includes('.')) {
    return normalized;
  }
  const normalizedSuffix = normalizeSymbol(suffix);
  if (!normalizedSuffix) return normalized;
  return normalizedSuffix.startsWith('.')
    ? `${normalized}${normalizedSuffix}`
    : `${normalized}.${normalizedSuffix}`;
};
