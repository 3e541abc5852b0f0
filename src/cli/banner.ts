const BANNER = `
  ╔═╗┌─┐┌─┐┌─┐┬ ┬
  ║  │ │├─┤│  ├─┤
  ╚═╝└─┘┴ ┴└─┘┴ ┴
`;

const TAGLINES = [
  "Never interrupt a moment.",
  "Hydrate between the hype.",
  "Your chat can wait a sip.",
  "Stretch when the room goes quiet.",
];

export function printBanner(version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  console.log(BANNER);
  console.log(`  Stream Self-Care v${version} — ${tagline}\n`);
}
