import type { LoggerLike } from '@inputtally/types';

export interface ShutdownContext {
  onShutdown: () => Promise<void>;
  logger: LoggerLike;
  /** Injected for tests. Default: process.exit */
  exit?: (code: number) => void;
}

/**
 * Run `onShutdown` once on SIGTERM/SIGINT, then exit. A second signal while
 * shutting down forces exit 1. Returns a function that detaches the handlers.
 */
export function setupSignalHandlers(ctx: ShutdownContext): () => void {
  const exit = ctx.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const handler = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      ctx.logger.warn('Forced exit on second signal', { signal });
      exit(1);
      return;
    }

    shuttingDown = true;
    ctx.logger.info('Received shutdown signal', { signal });

    try {
      await ctx.onShutdown();
      exit(0);
    } catch (err) {
      ctx.logger.warn('Error during shutdown', { error: String(err) });
      exit(1);
    }
  };

  const onSigterm = (): void => void handler('SIGTERM');
  const onSigint = (): void => void handler('SIGINT');
  process.on('SIGTERM', onSigterm);
  process.on('SIGINT', onSigint);

  return () => {
    process.off('SIGTERM', onSigterm);
    process.off('SIGINT', onSigint);
  };
}
