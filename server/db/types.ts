import type { ColumnType } from 'kysely';

export type Json = ColumnType<string, string, string>;

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

/** pg hands bigint columns back as strings. */
export type Int8 = ColumnType<string, number | string | bigint, number | string | bigint>;

export type Generated<T> =
  T extends ColumnType<infer S, infer I, infer U> ? ColumnType<S, I | undefined, U> : ColumnType<T, T | undefined, T>;

export interface Candles {
  id: Generated<Int8>;
  instrument: string;
  timeframe: string;
  timestamp: Timestamp;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: Int8;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

export interface CollectionEvents {
  id: Generated<Int8>;
  timestamp: Generated<Timestamp>;
  level: string;
  instrument: string | null;
  timeframe: string | null;
  message: string;
  details: Json | null;
}

export interface Database {
  candles: Candles;
  collection_events: CollectionEvents;
}
