import type {
  ClusterSnapshot,
  PostDeploymentCheck,
  PreDeploymentCheck,
  ServiceHealth,
} from '../schemas/index.js';
import { isHealthy } from '../engine/index.js';
import { InventoryError } from './inventory-source.js';

/**
 * Services to check: all of them, or the single named one.
 */
export function selectServices(snapshot: ClusterSnapshot, serviceName?: string): ServiceHealth[] {
  if (!serviceName) return snapshot.services;

  const service = snapshot.services.find((s) => s.name === serviceName);
  if (!service) {
    throw new InventoryError(`Service "${serviceName}" not found in cluster "${snapshot.clusterName}"`);
  }
  return [service];
}

export function preDeploymentCheck(snapshot: ClusterSnapshot, serviceName?: string): PreDeploymentCheck {
  const unhealthyServices = selectServices(snapshot, serviceName).filter((s) => !isHealthy(s));
  const ready = unhealthyServices.length === 0;

  return {
    action: 'pre-check',
    clusterName: snapshot.clusterName,
    status: ready ? 'ready' : 'not_ready',
    unhealthyServices,
    recommendation: ready ? 'Safe to deploy' : 'Fix unhealthy services before deployment',
  };
}

export function postDeploymentCheck(snapshot: ClusterSnapshot, serviceName?: string): PostDeploymentCheck {
  const services = selectServices(snapshot, serviceName);
  const healthyServices = services.filter(isHealthy).length;
  const totalServices = services.length;
  // an empty cluster has nothing unhealthy
  const healthPercentage = totalServices === 0 ? 100 : (healthyServices / totalServices) * 100;
  const success = healthyServices === totalServices;

  return {
    action: 'post-check',
    clusterName: snapshot.clusterName,
    status: success ? 'success' : 'partial',
    healthyServices,
    totalServices,
    healthPercentage,
    recommendation: success ? 'Deployment successful' : 'Some services may need attention',
  };
}
