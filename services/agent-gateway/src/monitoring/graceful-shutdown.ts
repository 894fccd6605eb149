export interface CleanupTask {
  name: string;
  run: () => Promise<void>;
}

export interface ShutdownOptions {
  timeout: number; // milliseconds
  forceExit: boolean;
  exit?: (code: number) => void;
}

/**
 * Runs registered cleanup tasks in order when the process is asked to stop.
 */
export class GracefulShutdown {
  private readonly cleanupTasks: CleanupTask[] = [];
  private readonly options: ShutdownOptions;
  private readonly exit: (code: number) => void;
  private isShuttingDown: boolean = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;

  constructor(options: Partial<ShutdownOptions> = {}) {
    this.options = {
      timeout: 30000,
      forceExit: true,
      ...options,
    };
    this.exit = options.exit ?? ((code: number) => process.exit(code));
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  setupSignalHandlers(): void {
    process.on('SIGTERM', () => {
      console.log('[shutdown] Received SIGTERM signal');
      void this.shutdown('SIGTERM');
    });

    process.on('SIGINT', () => {
      console.log('[shutdown] Received SIGINT signal');
      void this.shutdown('SIGINT');
    });

    process.on('uncaughtException', error => {
      console.error('[shutdown] Uncaught Exception:', error);
      void this.shutdown('uncaughtException', true);
    });

    process.on('unhandledRejection', reason => {
      console.error('[shutdown] Unhandled Rejection:', reason);
      void this.shutdown('unhandledRejection', true);
    });
  }

  addCleanupTask(name: string, run: () => Promise<void>): void {
    this.cleanupTasks.push({ name, run });
  }

  /**
   * Runs every cleanup task, then exits. A task failure is logged and the
   * remaining tasks still run.
   */
  async shutdown(signal: string, failed: boolean = false): Promise<void> {
    if (this.isShuttingDown) {
      console.log('[shutdown] Shutdown already in progress, ignoring signal:', signal);
      return;
    }

    this.isShuttingDown = true;
    console.log(`[shutdown] Initiating graceful shutdown due to: ${signal}`);

    this.shutdownTimeout = setTimeout(() => {
      console.error('[shutdown] Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        this.exit(1);
      }
    }, this.options.timeout);
    this.shutdownTimeout.unref();

    const taskFailures = await this.executeCleanupTasks();

    clearTimeout(this.shutdownTimeout);
    this.shutdownTimeout = null;

    console.log('[shutdown] Graceful shutdown completed');
    this.exit(failed || taskFailures > 0 ? 1 : 0);
  }

  isShuttingDownInProgress(): boolean {
    return this.isShuttingDown;
  }

  private async executeCleanupTasks(): Promise<number> {
    let failures = 0;
    for (const [i, task] of this.cleanupTasks.entries()) {
      try {
        console.log(`[shutdown] (${i + 1}/${this.cleanupTasks.length}) ${task.name}...`);
        await task.run();
      } catch (error) {
        failures++;
        console.error(`[shutdown] Cleanup task "${task.name}" failed:`, error);
      }
    }
    return failures;
  }
}
