// index.ts

export * from "./tablewright/model/errors.js";
export { BuildContext } from "./tablewright/model/buildContext.js";
export { ValueHolder } from "./tablewright/model/valueHolder.js";
export * from "./tablewright/model/columnTypes.js";
export * from "./tablewright/model/expressions.js";
export * from "./tablewright/model/constraints.js";
export { Enumeration, type EnumEntry } from "./tablewright/model/enumeration.js";
export { Column, type ColumnOptions, type ColumnShape } from "./tablewright/model/column.js";
export {
  ColumnNames,
  DEFAULT_TABLE_OPTIONS,
  Table,
  type TableItem,
  type TableOptions,
  type TableShape,
} from "./tablewright/model/table.js";
export {
  IN,
  INOUT,
  OUT,
  ProcComment,
  ProcParam,
  ProcSqlBody,
  StoredProcedure,
} from "./tablewright/model/storedProcedure.js";
export {
  EnumCollection,
  SchemaMetadata,
  type SchemaSnapshot,
  type SchemaSource,
  TableNames,
} from "./tablewright/model/metadata.js";
export { createVocabulary, type Vocabulary } from "./tablewright/model/vocabulary.js";
export * from "./tablewright/model/typeMappings.js";

export { assertNoImports, findImports } from "./tablewright/sandbox/importGuard.js";
export { type LoadOptions, type LoadedModel, loadModelFile, loadModelSource } from "./tablewright/sandbox/modelLoader.js";
export { checkSchemaName, validateSchema } from "./tablewright/sandbox/validateSchema.js";

export { type Dialect, type DialectName, DIALECT_NAMES, getDialect } from "./tablewright/sql/dialects.js";
export { adaptToEngine, highPrecisionTimestamps, rewriteColumns } from "./tablewright/sql/adaptToEngine.js";
export { compileDDL, createStatements, ddlFileName, writeDDLFile } from "./tablewright/sql/compileDDL.js";

export * from "./tablewright/materialize/settings.js";
export { getSSLConfig } from "./tablewright/materialize/sslConfig.js";
export { type SqlClient, poolClient } from "./tablewright/materialize/sqlClient.js";
export * from "./tablewright/materialize/database.js";
export { createEnumTables, readEnumTable, type EnumTable } from "./tablewright/materialize/enumTables.js";
export { buildEnumViews, createEnumViews, type EnumView } from "./tablewright/materialize/enumViews.js";
export { materializeEnums } from "./tablewright/materialize/materializeEnums.js";

export { loadTemplates, fileLoader, renderTemplate } from "./tablewright/codegen/templates.js";
export { packagesFor, EnumTemplateData } from "./tablewright/codegen/enumTemplateData.js";
export { forcedTypes, renderArtifacts, writeArtifacts } from "./tablewright/codegen/renderArtifacts.js";
export { generate } from "./tablewright/codegen/generate.js";

export { setLogSilent } from "./tablewright/utils/logger.js";
export { VERSION } from "./tablewright/version.js";
