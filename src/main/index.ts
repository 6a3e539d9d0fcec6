import { loadConfig } from './config';
import type { FlasherConfig } from './config';
import { logger } from './utils/logger';
import { getErrorMessage } from './utils/errors';
import { PortRegistry, formatPortLabel } from './serial/PortRegistry';
import { FirmwareCatalog } from './firmware/FirmwareCatalog';
import { EsptoolRunner } from './flash/EsptoolRunner';
import { FlashOrchestrator } from './flash/FlashOrchestrator';
import { DeviceConfigClient } from './device/DeviceConfigClient';
import { SessionController } from './session/SessionController';
import { formatInventory } from './inventory';
import { APP_VERSION } from '@shared/constants';
import { SessionEvent } from '@shared/types/session.types';
import type { OperationFinished } from '@shared/types/session.types';
import type { SerialPortInfo } from '@shared/types/port.types';

const USAGE = `Usage: signal-flasher <command> [options]
       signal-flasher --version

Commands:
  list                              Show serial ports and firmware versions
  monitor                           Watch for serial ports until Ctrl+C
  flash --port <path> [--version <name>]
  configure --port <path> --name <name> --id <id>

Environment:
  FLASHER_FIRMWARE_DIR  FLASHER_ESPTOOL  FLASHER_CHIP  FLASHER_BAUD  FLASHER_LOG_LEVEL`;

function getFlag(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function createSession(config: FlasherConfig, catalog: FirmwareCatalog): SessionController {
  const orchestrator = new FlashOrchestrator(
    new EsptoolRunner(config.esptoolCommand, config.esptoolArgs),
    { chip: config.chip, baudRate: config.baudRate }
  );

  return new SessionController({
    portRegistry: new PortRegistry(),
    catalog,
    orchestrator,
    configClient: new DeviceConfigClient(orchestrator),
  });
}

function attachConsole(session: SessionController): void {
  session.on(SessionEvent.OUTPUT, (line: string) => console.log(line));
  session.on(SessionEvent.STATUS, (status: string) => console.log(`[status] ${status}`));
  session.on(SessionEvent.VALIDATION_ERROR, (message: string) => console.error(`Error: ${message}`));
  session.on(SessionEvent.FINISHED, (result: OperationFinished) => {
    if (!result.success && result.error) {
      console.error(`Error: ${result.error}`);
    }
  });
}

async function main(argv: string[]): Promise<number> {
  const [command] = argv;
  if (!command || command === '--help' || command === '-h') {
    console.log(USAGE);
    return command ? 0 : 1;
  }
  if (command === '--version') {
    console.log(APP_VERSION);
    return 0;
  }

  const config = loadConfig();
  logger.setConsoleLevel(config.logLevel);
  logger.info(`Firmware directory: ${config.firmwareDir}`);

  const catalog = new FirmwareCatalog(config.firmwareDir);
  const session = createSession(config, catalog);
  attachConsole(session);
  await session.start();

  try {
    switch (command) {
      case 'list':
        for (const line of await formatInventory(session.getState(), catalog)) console.log(line);
        return 0;

      case 'monitor':
        session.on(SessionEvent.PORTS_CHANGED, (ports: SerialPortInfo[]) => {
          console.log(`Ports: ${ports.map(formatPortLabel).join(', ') || '(none)'}`);
        });
        await new Promise<void>((resolve) => process.once('SIGINT', () => resolve()));
        return 0;

      case 'flash': {
        const port = getFlag(argv, '--port');
        const version = getFlag(argv, '--version');
        if (port && !session.selectPort(port)) return 1;
        if (version && !(await session.selectVersion(version))) return 1;
        return (await session.flash()) ? 0 : 1;
      }

      case 'configure': {
        const port = getFlag(argv, '--port');
        if (port && !session.selectPort(port)) return 1;
        return (await session.configure(getFlag(argv, '--name') ?? '', getFlag(argv, '--id') ?? '')) ? 0 : 1;
      }

      default:
        console.error(`Unknown command: ${command}\n\n${USAGE}`);
        return 1;
    }
  } finally {
    await session.shutdown();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Fatal error:', error);
    console.error(getErrorMessage(error));
    process.exitCode = 1;
  });
