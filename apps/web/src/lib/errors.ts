// ============================================
// tRPC error helpers for forms
// ============================================

interface FormErrorSource {
  message: string;
  data?: {
    zodError?: {
      fieldErrors: Partial<Record<string, string[]>>;
      formErrors: string[];
    } | null;
  } | null;
}

/** First validation message for `field`, if the server rejected it */
export function fieldError(
  error: FormErrorSource | null | undefined,
  field: string
): string | undefined {
  return error?.data?.zodError?.fieldErrors[field]?.[0];
}

/** Banner text: field problems are shown inline, everything else here */
export function formError(
  error: FormErrorSource | null | undefined
): string | undefined {
  if (!error) return undefined;
  const zodError = error.data?.zodError;
  if (zodError) {
    return zodError.formErrors[0] ?? "Please correct the highlighted fields";
  }
  return error.message;
}
