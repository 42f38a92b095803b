/**
 * Fields a caller supplies for one failure variant; the `kind` tag is fixed by the constructor.
 */
export type FailureFields<F extends { readonly kind: string }> = Omit<F, "kind">;

export type SnippetOptions = {
  maxLength?: number;
};

/**
 * Freezes a freshly built failure so no layer can alter it after detection.
 */
export const sealFailure = <F extends { readonly kind: string }>(
  failure: F,
): F => {
  Object.freeze(failure);
  return failure;
};
