import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { loadConfig } from '@/config';
import { createRuntime } from '@/runtime/bootstrap';
import { registerShutdownHandlers } from '@/runtime/shutdown';

async function main(): Promise<void> {
  const config = loadConfig();
  const runtime = createRuntime(config);
  registerShutdownHandlers(runtime);
  await runtime.start();
  createLogger('Server').info('weather radio listening', {
    host: config.http.host,
    port: config.http.port,
  });
}

main().catch((error: unknown) => {
  createLogger('Server').error('fatal bootstrap error', { message: errorMessage(error) });
  process.exit(1);
});
