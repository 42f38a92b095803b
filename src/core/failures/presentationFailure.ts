import { sealFailure, type FailureFields } from "./failureValue";

export const presentationFailureKinds = [
  "formatting_failed",
  "write_failed",
] as const;

export type PresentationFailureKind = (typeof presentationFailureKinds)[number];

// Terminal stage: no variant can hold another failure.

export type FormattingFailed = {
  readonly kind: "formatting_failed";
  readonly dataType: string;
  readonly reason: string;
};

export type WriteFailed = {
  readonly kind: "write_failed";
  readonly target: string;
  readonly reason: string;
};

export type PresentationFailure = FormattingFailed | WriteFailed;

const presentationKindSet: ReadonlySet<string> = new Set(
  presentationFailureKinds,
);

export const isPresentationFailure = (value: {
  readonly kind: string;
}): value is PresentationFailure => presentationKindSet.has(value.kind);

export const presentationFailures = {
  formattingFailed: (
    fields: FailureFields<FormattingFailed>,
  ): FormattingFailed =>
    sealFailure<FormattingFailed>({
      kind: "formatting_failed",
      dataType: fields.dataType,
      reason: fields.reason,
    }),
  writeFailed: (fields: FailureFields<WriteFailed>): WriteFailed =>
    sealFailure<WriteFailed>({
      kind: "write_failed",
      target: fields.target,
      reason: fields.reason,
    }),
};

export const describePresentationFailure = (
  failure: PresentationFailure,
): string => {
  switch (failure.kind) {
    case "formatting_failed":
      return `Failed to format ${failure.dataType} for output: ${failure.reason}`;
    case "write_failed":
      return `Failed to write output to ${failure.target}: ${failure.reason}`;
  }
};
