import { ConfigurationError } from '../errors';

export type CqlType = 'text' | 'date' | 'double';

export interface ColumnDefinition {
  name: string;
  type: CqlType;
}

export interface ClusteringColumnDefinition extends ColumnDefinition {
  order: 'ASC' | 'DESC';
}

export interface StationTableDefinition {
  readonly table: string;
  readonly partitionKey: ColumnDefinition;
  readonly clusteringKey: ClusteringColumnDefinition;
  readonly staticColumns: readonly ColumnDefinition[];
  readonly regularColumns: readonly ColumnDefinition[];
}

export interface SchemaDescription extends StationTableDefinition {
  keyspace: string;
  /** `CREATE TABLE` statement for the table, as returned to introspection callers. */
  statement: string;
}

export const STATION_TABLE: StationTableDefinition = {
  table: 'stations',
  partitionKey: { name: 'id', type: 'text' },
  clusteringKey: { name: 'date', type: 'date', order: 'ASC' },
  staticColumns: [{ name: 'name', type: 'text' }],
  regularColumns: [
    { name: 'tmin', type: 'double' },
    { name: 'tmax', type: 'double' }
  ]
};

const IDENTIFIER_PATTERN = /^[a-z][a-z0-9_]{0,47}$/;

export function assertValidKeyspace(keyspace: string): string {
  if (!IDENTIFIER_PATTERN.test(keyspace)) {
    throw new ConfigurationError(`keyspace '${keyspace}' must match ${IDENTIFIER_PATTERN.source}`);
  }
  return keyspace;
}

export function renderCreateTable(keyspace: string, definition: StationTableDefinition = STATION_TABLE): string {
  const { partitionKey, clusteringKey } = definition;
  const lines = [
    `    ${partitionKey.name} ${partitionKey.type}`,
    `    ${clusteringKey.name} ${clusteringKey.type}`,
    ...definition.staticColumns.map((column) => `    ${column.name} ${column.type} static`),
    ...definition.regularColumns.map((column) => `    ${column.name} ${column.type}`),
    `    PRIMARY KEY (${partitionKey.name}, ${clusteringKey.name})`
  ];
  return [
    `CREATE TABLE ${keyspace}.${definition.table} (`,
    lines.join(',\n'),
    `) WITH CLUSTERING ORDER BY (${clusteringKey.name} ${clusteringKey.order});`
  ].join('\n');
}

export function describeStationSchema(keyspace: string): SchemaDescription {
  assertValidKeyspace(keyspace);
  return {
    keyspace,
    table: STATION_TABLE.table,
    partitionKey: { ...STATION_TABLE.partitionKey },
    clusteringKey: { ...STATION_TABLE.clusteringKey },
    staticColumns: STATION_TABLE.staticColumns.map((column) => ({ ...column })),
    regularColumns: STATION_TABLE.regularColumns.map((column) => ({ ...column })),
    statement: renderCreateTable(keyspace)
  };
}

/**
 * Idempotent DDL run against a real cluster at start. Existing keyspaces and
 * tables are left untouched.
 */
export function buildSchemaStatements(keyspace: string, replicationFactor: number): string[] {
  assertValidKeyspace(keyspace);
  const createTable = renderCreateTable(keyspace).replace('CREATE TABLE ', 'CREATE TABLE IF NOT EXISTS ');
  return [
    `CREATE KEYSPACE IF NOT EXISTS ${keyspace} WITH replication = {'class': 'SimpleStrategy', 'replication_factor': ${replicationFactor}}`,
    createTable
  ];
}
