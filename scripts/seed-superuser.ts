import { closeDatabase, initDatabase } from '../src/utils/db';
import { ensureFirstSuperuser } from '../src/services/userService';
import { error as logError } from '../src/utils/logger';

/**
 * Creates the FIRST_SUPERUSER account if it does not already exist.
 * @returns Promise resolving when the seed operation completes.
 */
async function main(): Promise<void> {
  initDatabase();
  await ensureFirstSuperuser();
}

main()
  .then(() => {
    closeDatabase();
  })
  .catch((err) => {
    logError('Failed to seed superuser', err);
    closeDatabase();
    process.exit(1);
  });
