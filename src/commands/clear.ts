import { parseCategory, withSystem } from './shared.js';

interface ClearOptions {
  category?: string;
  yes?: boolean;
}

/**
 * Drop every memory in a category
 */
export async function clear(options: ClearOptions = {}): Promise<void> {
  const category = parseCategory(options.category);

  // Require explicit confirmation unless --yes
  if (!options.yes) {
    console.log(`This will permanently delete all ${category}. Use --yes to confirm.`);
    return;
  }

  await withSystem((system) => system.store(category).clearMemories());
  console.log(`Cleared ${category}.`);
}
