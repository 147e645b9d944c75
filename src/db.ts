import mysql from 'mysql2/promise';
import config from './config';

const pool = mysql.createPool({
  host: config.database.host,
  user: config.database.user,
  password: config.database.password,
  database: config.database.database,
  port: config.database.port,
  waitForConnections: true,
  connectionLimit: 10,
  queueLimit: 0,
  connectTimeout: 10000,
});

export const checkDatabaseConnection = async () => {
  const connection = await pool.getConnection();
  try {
    await connection.ping();
    console.log('Database connected successfully');
  } finally {
    connection.release();
  }
};

export const isDuplicateEntryError = (error: unknown): error is Error & { code: string } =>
  error instanceof Error && 'code' in error && error.code === 'ER_DUP_ENTRY';

export default pool;
