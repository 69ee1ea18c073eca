import 'reflect-metadata';
import { CommandFactory } from 'nest-commander';
import { Logger } from 'nestjs-pino';
import { CliModule } from './cli.module';

async function bootstrap(): Promise<void> {
  const app = await CommandFactory.createWithoutRunning(CliModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  await CommandFactory.runApplication(app);
}

void bootstrap();
