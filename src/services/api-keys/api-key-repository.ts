import crypto from 'crypto';
import { pool } from '../../db/pool.js';

export interface ApiKeyRecord {
  id: number;
  name: string;
  isActive: boolean;
  createdAt: Date;
  lastUsedAt: Date | null;
}

interface ApiKeyRow {
  id: number;
  name: string;
  is_active: boolean;
  created_at: Date;
  last_used_at: Date | null;
}

function toRecord(row: ApiKeyRow): ApiKeyRecord {
  return {
    id: row.id,
    name: row.name,
    isActive: row.is_active,
    createdAt: row.created_at,
    lastUsedAt: row.last_used_at,
  };
}

/** 64 hex characters from 32 random bytes. */
export function generateApiKey(): string {
  return crypto.randomBytes(32).toString('hex');
}

export async function findActiveByKey(apiKey: string): Promise<ApiKeyRecord | null> {
  const { rows } = await pool.query<ApiKeyRow>(
    `SELECT id, name, is_active, created_at, last_used_at
       FROM api_keys
      WHERE api_key = $1 AND is_active = TRUE`,
    [apiKey],
  );
  return rows[0] ? toRecord(rows[0]) : null;
}

export async function touchLastUsed(id: number): Promise<void> {
  await pool.query('UPDATE api_keys SET last_used_at = NOW() WHERE id = $1', [id]);
}

export async function createApiKey(name: string): Promise<{ key: string; record: ApiKeyRecord }> {
  const key = generateApiKey();
  const { rows } = await pool.query<ApiKeyRow>(
    `INSERT INTO api_keys (api_key, name) VALUES ($1, $2)
     RETURNING id, name, is_active, created_at, last_used_at`,
    [key, name],
  );
  return { key, record: toRecord(rows[0]) };
}

export async function deactivateApiKey(apiKey: string): Promise<boolean> {
  const { rowCount } = await pool.query('UPDATE api_keys SET is_active = FALSE WHERE api_key = $1', [apiKey]);
  return (rowCount ?? 0) > 0;
}
