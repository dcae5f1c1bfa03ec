import { ApplicationBootstrap } from './bootstrap';
import { ApplicationServer } from './server';

async function main(): Promise<void> {
  const bootstrap = new ApplicationBootstrap({ handleSignals: true });
  const server = new ApplicationServer(bootstrap);

  try {
    await server.start();
  } catch (error) {
    console.error('Failed to start application:', error);
    await bootstrap.shutdown();
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error('Unhandled error in main:', error);
    process.exit(1);
  });
}

export { main };
