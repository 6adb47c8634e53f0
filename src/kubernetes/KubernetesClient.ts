import * as k8s from '@kubernetes/client-node';
import { Logger } from 'winston';
import { join } from 'path';
import { homedir } from 'os';
import { existsSync } from 'fs';

/**
 * Configuration options for KubernetesClient
 */
export interface KubernetesClientConfig {
  /**
   * Path to kubeconfig file. If not specified, will try default locations
   */
  kubeConfigPath?: string;

  /**
   * Specific context to use from kubeconfig. If not specified, uses current context
   */
  context?: string;

  /**
   * Whether to use in-cluster configuration (for pods running inside k8s)
   */
  inCluster?: boolean;

  /**
   * Bearer token for authentication
   */
  bearerToken?: string;

  /**
   * Kubernetes API server URL (used with bearerToken)
   */
  apiServerUrl?: string;

  /**
   * Skip TLS verification (not recommended for production)
   */
  skipTlsVerify?: boolean;

  logger?: Logger;
}

/**
 * Authentication method types
 */
export enum AuthMethod {
  KUBECONFIG = 'kubeconfig',
  IN_CLUSTER = 'in-cluster',
  TOKEN = 'token',
}

/**
 * Read-only view of a cluster: core objects, aggregated metrics APIs and the server version.
 */
export class KubernetesClient {
  private kc: k8s.KubeConfig;
  private coreV1Api: k8s.CoreV1Api;
  private customObjectsApi: k8s.CustomObjectsApi;
  private versionApi: k8s.VersionApi;
  private authMethod: AuthMethod;
  private logger?: Logger;

  constructor(private config: KubernetesClientConfig = {}) {
    this.logger = config.logger;
    this.kc = new k8s.KubeConfig();
    this.authMethod = this.detectAuthMethod();
    this.initializeClient();

    this.coreV1Api = this.kc.makeApiClient(k8s.CoreV1Api);
    this.customObjectsApi = this.kc.makeApiClient(k8s.CustomObjectsApi);
    this.versionApi = this.kc.makeApiClient(k8s.VersionApi);
  }

  private detectAuthMethod(): AuthMethod {
    if (this.config.inCluster) {
      return AuthMethod.IN_CLUSTER;
    }

    if (this.config.bearerToken && this.config.apiServerUrl) {
      return AuthMethod.TOKEN;
    }

    return AuthMethod.KUBECONFIG;
  }

  private initializeClient(): void {
    try {
      switch (this.authMethod) {
        case AuthMethod.IN_CLUSTER:
          this.kc.loadFromCluster();
          break;

        case AuthMethod.TOKEN:
          this.initializeTokenConfig();
          break;

        case AuthMethod.KUBECONFIG:
        default:
          this.initializeKubeConfig();
          break;
      }

      this.logger?.info(`Kubernetes client initialized using ${this.authMethod} authentication`);
    } catch (error) {
      const message = `Failed to initialize Kubernetes client: ${error instanceof Error ? error.message : String(error)}`;
      this.logger?.error(message);
      throw new Error(message);
    }
  }

  private initializeKubeConfig(): void {
    const kubeConfigPath = this.getKubeConfigPath();

    if (!existsSync(kubeConfigPath)) {
      throw new Error(`Kubeconfig file not found at: ${kubeConfigPath}`);
    }

    this.kc.loadFromFile(kubeConfigPath);

    if (this.config.context) {
      this.kc.setCurrentContext(this.config.context);
    }

    this.logger?.debug(`Loaded kubeconfig from: ${kubeConfigPath}`);
  }

  private initializeTokenConfig(): void {
    if (!this.config.bearerToken || !this.config.apiServerUrl) {
      throw new Error('Bearer token and API server URL are required for token authentication');
    }

    const cluster: k8s.Cluster = {
      name: 'default',
      server: this.config.apiServerUrl,
      skipTLSVerify: this.config.skipTlsVerify || false,
    };

    const user: k8s.User = {
      name: 'default',
      token: this.config.bearerToken,
    };

    const context: k8s.Context = {
      name: 'default',
      cluster: cluster.name,
      user: user.name,
    };

    this.kc.loadFromOptions({
      clusters: [cluster],
      users: [user],
      contexts: [context],
      currentContext: context.name,
    });

    this.logger?.debug(`Configured token authentication for: ${this.config.apiServerUrl}`);
  }

  private getKubeConfigPath(): string {
    if (this.config.kubeConfigPath) {
      return this.config.kubeConfigPath;
    }

    // KUBECONFIG can list several files separated by ':'
    const kubeConfigEnv = process.env.KUBECONFIG;
    if (kubeConfigEnv) {
      for (const path of kubeConfigEnv.split(':')) {
        if (existsSync(path)) {
          return path;
        }
      }
    }

    return join(homedir(), '.kube', 'config');
  }

  public getCurrentContext(): string {
    return this.kc.getCurrentContext();
  }

  public getAuthMethod(): AuthMethod {
    return this.authMethod;
  }

  /**
   * Test the connection to the Kubernetes API server
   */
  public async testConnection(): Promise<boolean> {
    try {
      await this.coreV1Api.listNamespace();
      this.logger?.debug('Successfully connected to Kubernetes API server');
      return true;
    } catch (error) {
      this.logger?.debug(
        `Failed to connect to Kubernetes API server: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  public get core(): k8s.CoreV1Api {
    return this.coreV1Api;
  }

  public get customObjects(): k8s.CustomObjectsApi {
    return this.customObjectsApi;
  }

  public get version(): k8s.VersionApi {
    return this.versionApi;
  }
}
