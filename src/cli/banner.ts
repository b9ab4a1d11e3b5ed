const BANNER = `
  ╔╦╗╦ ╦╦╔╗╔
   ║ ║║║║║║║
   ╩ ╚╩╝╩╝╚╝
`;

const TAGLINES = [
  "Your voice, with a human in the loop.",
  "Replies drafted, never unreviewed by default.",
  "Same you, more channels.",
];

export function printBanner(version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  console.log(BANNER);
  console.log(`  v${version} - ${tagline}\n`);
}
