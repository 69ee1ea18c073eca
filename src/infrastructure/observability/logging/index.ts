export { LoggerModule } from './logger.module';
export { AppLoggerService, LogContext } from './app-logger.service';
