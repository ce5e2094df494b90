import mysql from 'mysql2/promise';

// names and numbers compare byte for byte, so "john smith" is not "John Smith"
export const EXACT_MATCH_COLLATION = 'utf8mb4_bin';

export async function withConnection<T>(pool: mysql.Pool, fn: (connection: mysql.PoolConnection) => Promise<T>): Promise<T> {
  const connection = await pool.getConnection();
  try {
    return await fn(connection);
  } finally {
    connection.release();
  }
}
