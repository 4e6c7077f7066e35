// codegen/jdbc.ts

import type { DbSettings } from "../materialize/settings.js";
import type { DialectName } from "../sql/dialects.js";

export interface JdbcTarget {
  readonly driver: string;
  readonly url: string;
  /** jOOQ meta database class */
  readonly database: string;
  readonly inputSchema: string;
}

export function jdbcTarget(dialect: DialectName, settings: DbSettings): JdbcTarget {
  const where = `${settings.host}:${settings.port}/${settings.name}`;
  switch (dialect) {
    case "postgresql":
      return {
        driver: "org.postgresql.Driver",
        url: `jdbc:postgresql://${where}`,
        database: "org.jooq.meta.postgres.PostgresDatabase",
        inputSchema: "public",
      };
    case "mysql":
      return {
        driver: "com.mysql.cj.jdbc.Driver",
        url: `jdbc:mysql://${where}`,
        database: "org.jooq.meta.mysql.MySQLDatabase",
        inputSchema: settings.name,
      };
  }
}
