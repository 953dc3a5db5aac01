import type { AppConfig } from '../config';
import type { RecordService } from '../service/recordService';

/** What every route module needs; built once in `buildApp`. */
export interface RouteDeps {
  service: RecordService;
  config: AppConfig;
}
