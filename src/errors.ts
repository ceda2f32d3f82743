// Error types shared by the loader, the generator and the CLI

export class AstFormatError extends Error {
  constructor(message: string, public path: string, public filename?: string) {
    super(path ? `${message} at ${path}` : message);
    this.name = 'AstFormatError';
  }
}

export interface GeneratorError {
  filename?: string;
  line?: number;
  column?: number;
  message: string;
  severity: 'error' | 'warning' | 'info';
}

export function formatGeneratorError(error: GeneratorError): string {
  const file = error.filename ? `${error.filename}:` : '';
  const loc = error.line !== undefined && error.column !== undefined ? `${error.line}:${error.column}:` : '';
  return `${file}${loc} ${error.message}`.trim();
}
