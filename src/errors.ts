export type SlidewireErrorCode =
  | "E_HANDSHAKE_FAILED"
  | "E_NEGOTIATION_FAILED"
  | "E_CONNECTION_CLOSED"
  | "E_CONNECT_TIMEOUT"
  | "E_INVALID_CONFIG";

export class SlidewireError extends Error {
  readonly code: SlidewireErrorCode;

  constructor(code: SlidewireErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "SlidewireError";
  }
}

export const isSlidewireError = (
  value: unknown,
  code?: SlidewireErrorCode,
): value is SlidewireError =>
  value instanceof SlidewireError && (code === undefined || value.code === code);
