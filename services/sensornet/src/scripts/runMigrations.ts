import { closePool, ensureSchemaReady } from '../db/client';

export async function run(): Promise<void> {
  await ensureSchemaReady();
}

if (require.main === module) {
  run()
    .then(() => closePool())
    .catch((err) => {
      console.error('[sensornet:migrate] failed to run migrations', err);
      closePool().finally(() => process.exit(1));
    });
}
