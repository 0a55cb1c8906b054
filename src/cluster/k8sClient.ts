import * as k8s from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import { SourceUnavailable, formatErrorMessage } from '../errors';

const logger = getLogger();

// Build a CoreV1 client from the default kubeconfig, optionally switching context first
export function createCoreApi(context?: string): k8s.CoreV1Api {
  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromDefault();
  } catch (error: unknown) {
    const message = formatErrorMessage(error);
    logger.error(`Failed to load Kubernetes configuration: ${message}`);
    throw new SourceUnavailable('kubeconfig', `Kubernetes configuration error: ${message}`, { cause: error });
  }

  if (context) {
    const available = kc.getContexts().map(c => c.name);
    if (!available.includes(context)) {
      throw new SourceUnavailable(
        'kubeconfig',
        `Context "${context}" not found. Available contexts: ${available.join(', ')}`
      );
    }
    kc.setCurrentContext(context);
  }

  logger.info(`K8s context loaded: ${kc.getCurrentContext()}`);
  return kc.makeApiClient(k8s.CoreV1Api);
}
