export type DisasmErrorCode = 'invalid-argument' | 'config';

export class DisasmError extends Error {
  readonly code: DisasmErrorCode;

  constructor(code: DisasmErrorCode, message: string) {
    super(message);
    this.name = 'DisasmError';
    this.code = code;
  }
}
