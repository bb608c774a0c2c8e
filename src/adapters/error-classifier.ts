/**
 * Maps free-text exchange errors to canonical categories.
 *
 * Signatures are data: each category lists substring tuples, and a tuple
 * matches when every substring appears in the lowercased error text.
 */

export const ERROR_CATEGORIES = [
  "OrderNotFound",
  "PermissionDenied",
  "SymbolNotTradable",
  "AccountSyncPending",
  "InsufficientFunds",
  "Unclassified",
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export type ClassifiedCategory = Exclude<ErrorCategory, "Unclassified">;

export type ErrorSignature = readonly string[];

export interface ErrorSignatureEntry {
  category: ClassifiedCategory;
  signatures: readonly ErrorSignature[];
}

/** Ordered table: the first entry with a matching signature wins. */
export type ErrorSignatureTable = readonly ErrorSignatureEntry[];

const matchesSignature = (text: string, signature: ErrorSignature): boolean =>
  signature.length > 0 && signature.every((part) => text.includes(part.toLowerCase()));

export const classifyErrorText = (text: string, table: ErrorSignatureTable): ErrorCategory => {
  const lowered = text.toLowerCase();
  for (const entry of table) {
    if (entry.signatures.some((signature) => matchesSignature(lowered, signature))) {
      return entry.category;
    }
  }
  return "Unclassified";
};

const errorText = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
};

/** Classify any thrown value by its message. */
export const classifyError = (error: unknown, table: ErrorSignatureTable): ErrorCategory =>
  classifyErrorText(errorText(error), table);
