import { logger } from '../modules/observability';

/**
 * SIGINT/SIGTERM handling for a run. The first signal cancels cooperatively
 * so the output file is still complete; a second one exits at once.
 */
export class ShutdownHandler {
    private signals = 0;

    constructor(
        private readonly controller: AbortController,
        private readonly exit: (code: number) => void = (code) => process.exit(code)
    ) { }

    init(): void {
        process.on('SIGINT', () => this.handleSignal('SIGINT'));
        process.on('SIGTERM', () => this.handleSignal('SIGTERM'));

        process.on('unhandledRejection', (reason) => {
            logger.log('error', '[Fatal] Unhandled rejection', { error: reason });
        });
    }

    handleSignal(signal: string): void {
        this.signals++;
        if (this.signals === 1) {
            logger.log('warn', `[Shutdown] Received ${signal}, finishing in-flight lookups. Send again to exit immediately.`);
            this.controller.abort();
            return;
        }
        logger.log('error', `[Shutdown] Received ${signal} again, exiting`);
        this.exit(130);
    }
}
