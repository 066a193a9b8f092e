// Gateway model names to backend model identifiers. Lookup is
// case-insensitive; names without an entry are sent as given.

const SONNET_37 = "us.anthropic.claude-3-7-sonnet-20250219-v1:0";

const MODEL_ALIASES: ReadonlyMap<string, string> = new Map([
  ["claude-3.5-sonnet", SONNET_37],
  ["claude-3-5-sonnet", SONNET_37],
  ["claude-3.5-sonnet-thinking", `${SONNET_37}-thinking`],
  ["claude-3-5-sonnet-thinking", `${SONNET_37}-thinking`],
  ["claude-sonnet-4", "us.anthropic.claude-sonnet-4-20250514-v1:0"],
  ["claude-4-sonnet", "us.anthropic.claude-sonnet-4-20250514-v1:0"],
  ["claude-opus-4", "us.anthropic.claude-opus-4-20250514-v1:0"],
  ["claude-4-opus", "us.anthropic.claude-opus-4-20250514-v1:0"],
  ["gpt-4.1", "gpt-4.1"],
  ["gpt-4-1", "gpt-4.1"],
  ["gpt-4.1-mini", "gpt-4.1-mini"],
  ["gpt-4-1-mini", "gpt-4.1-mini"],
  ["gemini-2.0-flash", "gemini-2.0-flash-001"],
  ["gemini-2-flash", "gemini-2.0-flash-001"],
  ["gemini-1.5-pro", "gemini-1.5-pro-002"],
  ["gemini-1-5-pro", "gemini-1.5-pro-002"],
  ["o3", "o3"],
]);

export function mapModelName(name: string): string {
  return MODEL_ALIASES.get(name.toLowerCase()) ?? name;
}

export function knownModelAliases(): string[] {
  return [...MODEL_ALIASES.keys()];
}
