/**
 * Service Base Class for idseal
 * Shared initialize/cleanup lifecycle for services that wrap libsodium.
 *
 * Instances are not cached process-wide: each service owns only its
 * configuration and logger, so separate instances never share state.
 */

import { ServiceError } from "../types/errors";

import { ErrorUtils } from "./error-handling";

export abstract class ServiceBase {
  protected initialized = false;
  private initializing: Promise<void> | null = null;

  /**
   * Service-specific setup, run once before first use
   */
  protected abstract onInitialize(): Promise<void>;

  /**
   * Release anything acquired by onInitialize
   */
  public abstract cleanup(): Promise<void>;

  public isReady(): boolean {
    return this.initialized;
  }

  public getStatus(): { initialized: boolean; [key: string]: unknown } {
    return {
      initialized: this.initialized,
      initializing: this.initializing !== null,
      serviceName: this.constructor.name,
    };
  }

  /**
   * Initialize the service. Concurrent callers share one initialization.
   */
  public async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    if (!this.initializing) {
      this.initializing = this.runInitialize().finally(() => {
        this.initializing = null;
      });
    }
    await this.initializing;
  }

  protected async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
    }
  }

  private async runInitialize(): Promise<void> {
    const context = ErrorUtils.createContext(this.constructor.name, "initialize", {
      severity: "high",
    });

    const result = await ErrorUtils.withErrorHandling(
      () => this.onInitialize(),
      context
    );

    if (!result.success) {
      throw new ServiceError(
        `Failed to initialize ${this.constructor.name}: ${String(result.error)}`,
        {
          code: "SERVICE_INITIALIZATION_ERROR",
          details: { serviceName: this.constructor.name, error: result.error },
        }
      );
    }
    this.initialized = true;
  }
}
