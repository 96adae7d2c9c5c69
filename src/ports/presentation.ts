import type { Highlight } from "../core/protocol/reply";

/**
 * Presentation port: read-only displays, messages, and choice menus.
 */
export interface PresentationPort {
  showInfo(text: string, highlights: Highlight[]): void;

  /** Resolves with the chosen entry, or undefined when the menu is dismissed. */
  offerChoices(title: string, choices: string[]): Promise<string | undefined>;

  message(text: string): void;
}
