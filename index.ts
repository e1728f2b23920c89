export {
  initializeServices,
  initializeIngestion,
  checkServiceHealth,
  cleanupServices,
  type ServiceRegistry,
  type IngestionRegistry,
  type ExternalOverrides,
} from './bootstrap/serviceBootstrap';
export { getConfig, loadConfig, type AppConfig } from './utils/config';

export { TutorService } from './services/TutorService';
export { AdaptiveAgentService } from './services/AdaptiveAgentService';
export { ProfileService } from './services/ProfileService';
export { ProgressTrackerService } from './services/ProgressTrackerService';
export { SessionManagerService } from './services/SessionManagerService';
export { SemanticSearchService } from './services/SemanticSearchService';
export { IngestionPipeline } from './services/ingestion/IngestionPipeline';
export * from './services/base/ServiceError';

export * from './shared/types/agent.types';
export * from './shared/types/conversation.types';
export * from './shared/types/ingestion.types';
export * from './shared/types/metadata.types';
export * from './shared/types/profile.types';
export * from './shared/types/progress.types';
export * from './shared/types/search.types';
export * from './shared/types/tutor.types';
export * from './shared/types/vector.types';
