import colors from 'ansi-colors';

export function showTitle(title: string): void {
  console.log(colors.bold(`\n${title}`));
}

/**
 * Key/value pairs, with keys padded to the longest one
 */
export function showProperties(properties: Record<string, string>): void {
  const width = Math.max(...Object.keys(properties).map(key => key.length));
  for (const [key, value] of Object.entries(properties)) {
    console.log(`${colors.gray(`${key}:`.padEnd(width + 1))} ${value}`);
  }
}

export function showList(items: string[], emptyMessage = 'None'): void {
  if (items.length === 0) {
    console.log(colors.gray(emptyMessage));
    return;
  }
  for (const item of items) {
    console.log(`${colors.gray('•')} ${item}`);
  }
}
