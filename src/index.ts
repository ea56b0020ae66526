export * from './querystring/index.js';

export { OPERATOR_KINDS, isOperatorKind } from './conditions/types.js';
export type {
  Condition,
  ConditionGroup,
  ConditionItem,
  ConditionTree,
  ConditionValue,
  GroupRelation,
  NestedCondition,
  OperatorKind,
  ScoreMode,
} from './conditions/types.js';
export { FieldMapper } from './conditions/FieldMapper.js';
export type { MappedConditionTree, QueryField } from './conditions/FieldMapper.js';

export { DslQueryBuilder } from './dsl/DslQueryBuilder.js';
export type { DslClause, DslQueryBuilderOptions, SearchRequestBody, SortOrder } from './dsl/DslQueryBuilder.js';

export {
  emptyMappingConfig,
  loadMappingConfig,
  loadMappingConfigFromEnv,
  resolveFieldMapping,
} from './config/mappings.js';
export type { MappingConfig } from './config/mappings.js';
export { ConditionValidator } from './validators/ConditionValidator.js';
export { MappingConfigValidator } from './validators/MappingConfigValidator.js';
export { ValidationError } from './validators/ValidationError.js';

export { Logger, logger } from './utils/logger.js';
export { LogLevel, loadDebugConfig } from './config/debug.js';
export type { DebugConfig, LogFormat } from './config/debug.js';

export { createQueryServer } from './server/QueryServer.js';
export { QueryController } from './server/QueryController.js';
export type { McpContent } from './server/QueryController.js';
