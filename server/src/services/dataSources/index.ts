export { DataSourceService } from './DataSourceService';
export {
  PASSWORD_MASK,
  isDataSourceType,
  parseDataSourceType,
  validateDataSourceConfig,
  maskConfigPassword,
} from './configSchemas';
