import type { PoolClient } from 'pg';

type Migration = {
  id: string;
  statements: string[];
};

const MIGRATION_TABLE = 'sensornet_schema_migrations';

const migrations: Migration[] = [
  {
    id: '001_sensornet_metadata',
    statements: [
      `CREATE EXTENSION IF NOT EXISTS postgis;`,
      `CREATE TABLE IF NOT EXISTS sensor__network_metadata (
         name TEXT PRIMARY KEY,
         info JSONB NOT NULL DEFAULT '{}'::jsonb
       );`,
      `CREATE TABLE IF NOT EXISTS sensor__node_metadata (
         id TEXT NOT NULL,
         sensor_network TEXT NOT NULL REFERENCES sensor__network_metadata(name) ON DELETE CASCADE,
         location geometry(Point, 4326),
         info JSONB NOT NULL DEFAULT '{}'::jsonb,
         PRIMARY KEY (id, sensor_network)
       );`,
      `CREATE TABLE IF NOT EXISTS sensor__sensor_metadata (
         name TEXT PRIMARY KEY,
         observed_properties JSONB NOT NULL DEFAULT '{}'::jsonb,
         info JSONB NOT NULL DEFAULT '{}'::jsonb
       );`,
      `CREATE TABLE IF NOT EXISTS sensor__sensor_to_node (
         sensor TEXT NOT NULL REFERENCES sensor__sensor_metadata(name) ON DELETE CASCADE,
         network TEXT NOT NULL,
         node TEXT NOT NULL,
         PRIMARY KEY (sensor, network, node),
         FOREIGN KEY (node, network) REFERENCES sensor__node_metadata(id, sensor_network) ON DELETE CASCADE
       );`,
      `CREATE TABLE IF NOT EXISTS sensor__feature_metadata (
         name TEXT PRIMARY KEY,
         observed_properties JSONB NOT NULL DEFAULT '[]'::jsonb
       );`,
      `CREATE INDEX IF NOT EXISTS idx_sensor_node_location
         ON sensor__node_metadata USING GIST (location);`,
      `CREATE INDEX IF NOT EXISTS idx_sensor_to_node_node
         ON sensor__sensor_to_node(network, node);`
    ]
  },
  {
    id: '002_sensornet_datadumps',
    statements: [
      `CREATE TABLE IF NOT EXISTS sensor__datadumps (
         id TEXT PRIMARY KEY,
         request TEXT NOT NULL,
         part INTEGER NOT NULL,
         total INTEGER NOT NULL,
         data TEXT NOT NULL,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       );`,
      `CREATE INDEX IF NOT EXISTS idx_sensor_datadumps_request
         ON sensor__datadumps(request, part);`
    ]
  }
];

export async function runMigrations(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      id TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  const { rows } = await client.query<{ id: string }>(`SELECT id FROM ${MIGRATION_TABLE}`);
  const applied = new Set(rows.map((row) => row.id));

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }

    await client.query('BEGIN');
    try {
      for (const statement of migration.statements) {
        await client.query(statement);
      }
      await client.query(`INSERT INTO ${MIGRATION_TABLE} (id) VALUES ($1) ON CONFLICT DO NOTHING`, [
        migration.id
      ]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }
}
