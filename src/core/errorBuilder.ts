import type { Diagnostic } from './types.js';

type Common = {
  hint?: string;
  path?: string;
};

export function errorDiag(code: string, message: string, extra: Common = {}): Diagnostic {
  return { severity: 'error', code, message, ...extra };
}

export function warningDiag(code: string, message: string, extra: Common = {}): Diagnostic {
  return { severity: 'warning', code, message, ...extra };
}
