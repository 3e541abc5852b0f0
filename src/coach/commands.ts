export type CoachCommand =
  | { readonly kind: "reset"; readonly timer: string }
  | { readonly kind: "status" };

/**
 * Parses `<prefix> reset <timer>` and `<prefix> status` (a bare prefix means
 * status). Anything else, including an unknown verb, is ordinary chat.
 */
export function parseCoachCommand(content: string, prefix: string): CoachCommand | null {
  const trimmed = content.trim();
  if (!trimmed.toLowerCase().startsWith(prefix.toLowerCase())) return null;

  const rest = trimmed.slice(prefix.length);
  // "!coachella" is not "!coach"
  if (rest.length > 0 && !/^\s/.test(rest)) return null;

  const [verb = "", arg] = rest.trim().split(/\s+/);
  switch (verb.toLowerCase()) {
    case "":
    case "status":
      return { kind: "status" };
    case "reset":
      return arg ? { kind: "reset", timer: arg.toLowerCase() } : null;
    default:
      return null;
  }
}
