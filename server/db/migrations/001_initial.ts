import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  // candles
  await db.schema
    .createTable('candles')
    .ifNotExists()
    .addColumn('id', 'bigserial', (col) => col.primaryKey())
    .addColumn('instrument', 'text', (col) => col.notNull())
    .addColumn('timeframe', 'text', (col) => col.notNull())
    .addColumn('timestamp', 'timestamptz', (col) => col.notNull())
    .addColumn('open', 'double precision', (col) => col.notNull())
    .addColumn('high', 'double precision', (col) => col.notNull())
    .addColumn('low', 'double precision', (col) => col.notNull())
    .addColumn('close', 'double precision', (col) => col.notNull())
    .addColumn('volume', 'bigint', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'timestamptz', (col) => col.defaultTo(sql`NOW()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.defaultTo(sql`NOW()`))
    .execute();

  await db.schema
    .createIndex('candles_instrument_timeframe_timestamp_key')
    .ifNotExists()
    .on('candles')
    .columns(['instrument', 'timeframe', 'timestamp'])
    .unique()
    .execute();

  await db.schema.createIndex('idx_candles_timestamp').ifNotExists().on('candles').column('timestamp').execute();

  await db.schema
    .createIndex('idx_candles_instrument_timeframe')
    .ifNotExists()
    .on('candles')
    .columns(['instrument', 'timeframe'])
    .execute();

  await sql`
    CREATE OR REPLACE FUNCTION candles_touch_updated_at()
    RETURNS TRIGGER AS $$
    BEGIN
      NEW.updated_at = NOW();
      RETURN NEW;
    END;
    $$ LANGUAGE plpgsql
  `.execute(db);

  await sql`DROP TRIGGER IF EXISTS candles_touch_updated_at ON candles`.execute(db);
  await sql`
    CREATE TRIGGER candles_touch_updated_at
    BEFORE UPDATE ON candles
    FOR EACH ROW EXECUTE FUNCTION candles_touch_updated_at()
  `.execute(db);

  // collection_events
  await db.schema
    .createTable('collection_events')
    .ifNotExists()
    .addColumn('id', 'bigserial', (col) => col.primaryKey())
    .addColumn('timestamp', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .addColumn('level', 'text', (col) => col.notNull())
    .addColumn('instrument', 'text')
    .addColumn('timeframe', 'text')
    .addColumn('message', 'text', (col) => col.notNull())
    .addColumn('details', 'jsonb')
    .execute();

  await db.schema
    .createIndex('idx_collection_events_timestamp')
    .ifNotExists()
    .on('collection_events')
    .column('timestamp')
    .execute();

  await db.schema.createIndex('idx_collection_events_level').ifNotExists().on('collection_events').column('level').execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('collection_events').ifExists().execute();
  await sql`DROP TRIGGER IF EXISTS candles_touch_updated_at ON candles`.execute(db);
  await sql`DROP FUNCTION IF EXISTS candles_touch_updated_at()`.execute(db);
  await db.schema.dropTable('candles').ifExists().execute();
}
