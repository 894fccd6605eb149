import { AppConfig } from '../../config/app-config.js';
import { AdminCredentials } from '../../middleware/admin-auth.js';
import { ErrorHandler } from '../../monitoring/error-handler.js';
import { HealthMonitor } from '../../monitoring/health-monitor.js';
import { ChatService } from '../../services/chat-service.js';
import { InstanceLoader } from '../../services/instance-loader.js';
import { LlmRequestTracker } from '../../services/llm-request-tracker.js';
import { MessageService } from '../../services/message-service.js';
import { PoolManager } from '../../services/pool-manager.js';
import { SessionService } from '../../services/session-service.js';

export interface GatewayServices {
  appConfig: AppConfig;
  loader: InstanceLoader;
  pools: PoolManager;
  sessions: SessionService;
  messages: MessageService;
  tracker: LlmRequestTracker;
  chat: ChatService;
  healthMonitor: HealthMonitor;
  errorHandler: ErrorHandler;
  adminCredentials: AdminCredentials;
}
