// ---------------------------------------------------------------------------
// Mail2SMS — Main Entry Point
// ---------------------------------------------------------------------------
// Boots the gateway with the default (or CLI-specified) config file.
// ---------------------------------------------------------------------------

import { Application } from './core/Application';
import { SmtpConnector } from './modules/connector.smtp';
import { SmsGatewayModule } from './modules/gateway.sms';

async function main(): Promise<void> {
  const configPath = process.argv[2] ?? 'config/default.yaml';

  const app = new Application();

  // Keep references for dependency injection
  const gateway = new SmsGatewayModule();
  const smtp = new SmtpConnector();

  app.registerModule('gateway.sms', () => gateway);
  app.registerModule('connector.smtp', () => smtp);

  app.onPreInit(() => {
    smtp.setHandler(gateway);
  });

  await app.start(configPath);
}

main().catch((err) => {
  console.error('Mail2SMS gateway failed to start:', err);
  process.exit(1);
});
