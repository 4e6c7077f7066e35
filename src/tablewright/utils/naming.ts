// utils/naming.ts

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

const snakeCache = new Map<string, string>();

/** `OrderStatus` → `order_status`, `HTTPCode` → `http_code` */
export function camelToSnake(name: string): string {
  const cached = snakeCache.get(name);
  if (cached !== undefined) return cached;

  const snake = name
    .replace(/(.)([A-Z][a-z]+)/g, "$1_$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase();
  snakeCache.set(name, snake);
  return snake;
}

/** Physical lookup table of an enumeration */
export function enumTableName(enumName: string): string {
  return `enum_${camelToSnake(enumName)}`;
}

/** Read-only view exposing a table's enum columns by name */
export function enumViewName(tableName: string): string {
  return `enumed_${tableName}_view`;
}

export function checkConstraintName(table: string, column: string): string {
  return `ck_${table}_${column}`;
}

export function indexName(table: string, column: string): string {
  return `ix_${table}_${column}`;
}
