export class ProgramLoadError extends Error {
  location: string;

  constructor(location: string, message: string) {
    super(`无法加载程序 ${location}：${message}`);
    this.name = 'ProgramLoadError';
    this.location = location;
  }
}

export class AnalyzeRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AnalyzeRequestError';
  }
}

export function asErrorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
