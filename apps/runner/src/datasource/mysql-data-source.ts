/**
 * DataSource backed by a mysql2 connection pool.
 *
 * MemSQL speaks the MySQL wire protocol, so the plain mysql2 driver
 * serves both the plan cache summary and the status query.
 */

import { createPool } from "mysql2/promise";
import type { Pool, RowDataPacket } from "mysql2/promise";
import type { DataRow, DataSource } from "@plantop/sdk";
import { QueryError, describeError } from "@plantop/sdk";
import type { ConnectionConfig } from "@plantop/shared";
import { createLogger } from "@plantop/shared";

const logger = createLogger("MysqlDataSource");

export interface MysqlDataSource extends DataSource {
  /** "host:port" label for logs and the dashboard header. */
  describe(): string;
  /** Drain and close the pool. */
  close(): Promise<void>;
}

export function createMysqlDataSource(connection: ConnectionConfig): MysqlDataSource {
  const pool: Pool = createPool({
    host: connection.host,
    port: connection.port,
    user: connection.user,
    password: connection.password,
    database: connection.database,
    connectionLimit: 2,
    supportBigNumbers: true,
  });
  const label = `${connection.host}:${connection.port}`;
  let closed = false;

  async function query(sql: string): Promise<readonly DataRow[]> {
    try {
      const [rows] = await pool.query<RowDataPacket[]>(sql);
      return rows;
    } catch (err) {
      throw new QueryError(sql, describeError(err), { cause: err });
    }
  }

  return {
    query,

    async get(sql: string): Promise<DataRow | undefined> {
      const rows = await query(sql);
      return rows[0];
    },

    describe(): string {
      return label;
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      await pool.end();
      logger.debug("Connection pool closed", { host: label });
    },
  };
}
