import type { SessionAction } from "./engine/session";
import type { Mode, Screen } from "./types";

/** The subset of ink's key flags the key map reads. */
export type KeyInfo = {
  return?: boolean;
  backspace?: boolean;
  delete?: boolean;
  escape?: boolean;
  tab?: boolean;
  ctrl?: boolean;
  meta?: boolean;
};

export type KeyCommand =
  | { kind: "dispatch"; action: SessionAction; clearDraft?: boolean }
  | { kind: "edit"; draft: string }
  | { kind: "ignore" };

const dispatch = (action: SessionAction, clearDraft = false): KeyCommand => ({ kind: "dispatch", action, clearDraft });
const ignore: KeyCommand = { kind: "ignore" };

// Most terminals send DEL for Backspace, which ink reports as `delete`.
const isBackspace = (key: KeyInfo) => key.backspace === true || key.delete === true;

function inputKey(input: string, key: KeyInfo, draft: string): KeyCommand {
  if (key.return) return dispatch({ type: "addTarget", raw: draft }, true);
  if (key.tab) return dispatch({ type: "start" });
  if (key.escape) return dispatch({ type: "quit" });
  if (isBackspace(key)) {
    return draft.length === 0 ? dispatch({ type: "removeLastTarget" }) : { kind: "edit", draft: draft.slice(0, -1) };
  }
  if (draft.length === 0 && input === "q") return dispatch({ type: "quit" });
  if (draft.length === 0 && input === "m") return dispatch({ type: "toggleMode" });
  if (!input || key.ctrl || key.meta) return ignore;
  // Pasted text arrives as one chunk; keep printable characters only.
  const printable = input.replace(/[\u0000-\u001f\u007f]/g, "");
  return printable ? { kind: "edit", draft: draft + printable } : ignore;
}

function runningKey(input: string, key: KeyInfo): KeyCommand {
  if (key.escape || input === "c") return dispatch({ type: "cancel" });
  if (input === "q") return dispatch({ type: "quit" });
  return ignore;
}

function resultsKey(input: string, key: KeyInfo, mode: Mode): KeyCommand {
  if (key.escape) return dispatch({ type: "quit" });
  switch (input) {
    case "q":
      return dispatch({ type: "quit" });
    case "s":
      return dispatch({ type: "cycleSort" });
    case "d":
      return dispatch({ type: "toggleDirection" });
    case "r":
      return dispatch({ type: "reset" });
    case "m":
      return dispatch({ type: "toggleMode" });
    case "e":
      return dispatch({ type: "export" });
    case "a":
      return mode === "dns" ? dispatch({ type: "applyBest" }) : ignore;
    default:
      return ignore;
  }
}

export function mapKey(screen: Screen, mode: Mode, input: string, key: KeyInfo, draft: string): KeyCommand {
  if (key.ctrl && input === "c") return dispatch({ type: "quit" });
  switch (screen) {
    case "input":
      return inputKey(input, key, draft);
    case "running":
      return runningKey(input, key);
    case "results":
      return resultsKey(input, key, mode);
  }
}

export const KEY_HINTS: Record<Screen, (mode: Mode) => string[]> = {
  input: (mode) => [
    `Enter: Add ${mode === "dns" ? "DNS" : "mirror"}`,
    "Backspace: Remove",
    "Tab: Start test",
    `m: ${mode === "dns" ? "Mirror" : "DNS"} mode`,
    "q: Quit",
  ],
  running: () => ["c: Cancel", "q: Quit"],
  results: (mode) => [
    "s: Sort",
    "d: Dir",
    "r: New test",
    ...(mode === "dns" ? ["a: Apply fastest"] : []),
    "e: Export",
    "m: Mode",
    "q: Quit",
  ],
};
