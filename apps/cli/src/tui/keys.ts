export type GameOverAction = "play_again" | "quit";

/** Keys are matched case-insensitively so `R` and `Q` work with caps lock on. */
export function gameOverAction(input: string): GameOverAction | null {
  switch (input.toLowerCase()) {
    case "r":
      return "play_again";
    case "q":
      return "quit";
    default:
      return null;
  }
}

export function isQuitKey(input: string): boolean {
  return input.toLowerCase() === "q";
}
