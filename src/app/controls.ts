export type Action = "quit" | "show-status";

export interface KeyBinding {
  key: string;
  action: Action;
  label: string;
}

export const KEY_BINDINGS: KeyBinding[] = [
  { key: "s", action: "show-status", label: "Show status" },
  { key: "q", action: "quit", label: "Quit" },
  { key: "escape", action: "quit", label: "Quit" },
];

const keyToAction = new Map<string, Action>();
for (const binding of KEY_BINDINGS) {
  keyToAction.set(binding.key, binding.action);
}

export function getAction(keyName: string | undefined, ctrl = false): Action | undefined {
  if (!keyName) return undefined;
  if (ctrl && keyName === "c") return "quit";
  return keyToAction.get(keyName);
}

export function formatHelp(): string {
  return KEY_BINDINGS.map((binding) => `[${binding.key}] ${binding.label}`).join("  ");
}
