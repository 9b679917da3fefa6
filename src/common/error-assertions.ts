export function getErrorInfo(e: unknown): { message: string; stack?: string } {
  if (e instanceof Error) return { message: e.message, stack: e.stack };
  if (typeof e === 'string') return { message: e };
  try {
    const serialized = JSON.stringify(e);
    return { message: serialized ?? String(e) };
  } catch {
    return { message: String(e) };
  }
}
