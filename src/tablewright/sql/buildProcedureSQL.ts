// sql/buildProcedureSQL.ts

import type { StoredProcedure } from "../model/storedProcedure.js";
import { escapeLiteral, indent } from "../utils/text.js";

function header(proc: StoredProcedure): string {
  if (proc.params.length === 0) return `CREATE OR REPLACE PROCEDURE ${proc.name}()`;
  const params = proc.params.map((p) => p.sql).join(",\n");
  return `CREATE OR REPLACE PROCEDURE ${proc.name}(\n${indent(params)}\n)`;
}

/** MySQL/MariaDB procedure, body between BEGIN and END */
export function buildMysqlProcedure(proc: StoredProcedure): string[] {
  const parts = [header(proc), "LANGUAGE SQL"];
  if (proc.comment) parts.push(`COMMENT '${escapeLiteral(proc.comment)}'`);
  parts.push("BEGIN", indent(proc.body), "END");
  return [parts.join("\n")];
}

/** PL/pgSQL procedure plus its comment statement */
export function buildPostgresProcedure(proc: StoredProcedure): string[] {
  const create = [
    header(proc),
    "LANGUAGE plpgsql",
    "AS $$",
    "BEGIN",
    indent(proc.body),
    "END;",
    "$$",
  ].join("\n");

  if (!proc.comment) return [create];
  return [create, `COMMENT ON PROCEDURE ${proc.name} IS '${escapeLiteral(proc.comment)}'`];
}

/** Script form: the body's own `;` must not end the statement */
export function delimitMysql(statement: string): string {
  return ["DELIMITER //", `${statement}\n//`, "DELIMITER ;"].join("\n");
}
