export * from './config';
export * from './sql/SqlExecutor';
export * from './sql/PgSqlExecutor';
export * from './sql/statement';
export * from './QueryStages';
export * from './ActionGateway';
export * from './client/GatewayClient';
