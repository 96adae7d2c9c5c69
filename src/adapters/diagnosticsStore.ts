import type { Diagnostic } from "../outcome";
import type { DiagnosticsPort, Disposable } from "../ports";

/**
 * Collects diagnostics per file and tells listeners when a file's set is complete.
 */
export class DiagnosticsStore implements DiagnosticsPort {
  private readonly byFile = new Map<string, Diagnostic[]>();
  private readonly listeners = new Set<(file: string, diagnostics: Diagnostic[]) => void>();

  reset(file: string): void {
    this.byFile.delete(file);
  }

  add(diagnostic: Diagnostic): void {
    const file = diagnostic.range?.file ?? "";
    const list = this.byFile.get(file) ?? [];
    list.push(diagnostic);
    this.byFile.set(file, list);
  }

  signalAvailable(file: string): void {
    const diagnostics = this.get(file);
    for (const listener of [...this.listeners]) listener(file, diagnostics);
  }

  get(file: string): Diagnostic[] {
    return [...(this.byFile.get(file) ?? [])];
  }

  onAvailable(listener: (file: string, diagnostics: Diagnostic[]) => void): Disposable {
    this.listeners.add(listener);
    return { dispose: () => { this.listeners.delete(listener); } };
  }
}
