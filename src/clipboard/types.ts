export interface ClipboardSink {
  /** Put text on the system clipboard. Rejects when no mechanism works. */
  copy(text: string): Promise<void>;
  /** Text of the current primary selection, or null when there is none. */
  readSelection(): Promise<string | null>;
}
