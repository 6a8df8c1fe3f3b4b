// ========== Diagnostic sinks ==========

/** Receives human-readable notices while a table is being profiled. `column` is null for table-level notices. */
export interface DiagnosticSink {
  notice(column: string | null, message: string): void
}

export function formatNotice(column: string | null, message: string): string {
  return column === null ? message : `Column "${column}" ${message}`
}

export class NoticeCollector implements DiagnosticSink {
  private readonly items: string[] = []

  constructor(private readonly forward?: DiagnosticSink) {}

  notice(column: string | null, message: string): void {
    this.items.push(formatNotice(column, message))
    this.forward?.notice(column, message)
  }

  get notices(): string[] {
    return [...this.items]
  }
}

export const consoleDiagnostics: DiagnosticSink = {
  notice(column, message) {
    console.warn('[PROFILE]', formatNotice(column, message))
  },
}
