import { z } from 'zod';

export const ServiceHealthSchema = z.object({
  name: z.string().min(1),
  status: z.string(),
  runningCount: z.number().int().min(0),
  desiredCount: z.number().int().min(0),
});
export type ServiceHealth = z.infer<typeof ServiceHealthSchema>;

export const LoadBalancerSchema = z.object({
  name: z.string().min(1),
  type: z.string().default('application'),
  state: z.string(),
  scheme: z.string().default('internet-facing'),
  dnsName: z.string().default('Unknown'),
});
export type LoadBalancer = z.infer<typeof LoadBalancerSchema>;

export const ClusterSnapshotSchema = z.object({
  clusterName: z.string().min(1),
  status: z.string().default('ACTIVE'),
  runningTasks: z.number().int().min(0).default(0),
  pendingTasks: z.number().int().min(0).default(0),
  services: z.array(ServiceHealthSchema).default([]),
  loadBalancers: z.array(LoadBalancerSchema).default([]),
});
export type ClusterSnapshot = z.infer<typeof ClusterSnapshotSchema>;

export const InventoryFileSchema = z.union([
  z.object({ clusters: z.array(ClusterSnapshotSchema) }),
  ClusterSnapshotSchema,
]);
export type InventoryFile = z.infer<typeof InventoryFileSchema>;

export const PreDeploymentCheckSchema = z.object({
  action: z.literal('pre-check'),
  clusterName: z.string(),
  status: z.enum(['ready', 'not_ready']),
  unhealthyServices: z.array(ServiceHealthSchema),
  recommendation: z.string(),
});
export type PreDeploymentCheck = z.infer<typeof PreDeploymentCheckSchema>;

export const PostDeploymentCheckSchema = z.object({
  action: z.literal('post-check'),
  clusterName: z.string(),
  status: z.enum(['success', 'partial']),
  healthyServices: z.number().int().min(0),
  totalServices: z.number().int().min(0),
  healthPercentage: z.number().min(0).max(100),
  recommendation: z.string(),
});
export type PostDeploymentCheck = z.infer<typeof PostDeploymentCheckSchema>;

export const DeploymentCheckSchema = z.discriminatedUnion('action', [
  PreDeploymentCheckSchema,
  PostDeploymentCheckSchema,
]);
export type DeploymentCheck = z.infer<typeof DeploymentCheckSchema>;

// What an infrastructure analysis is about; observedAt stamps the report header
export type InfrastructureSubject =
  | { kind: 'architecture'; observedAt: string; snapshot: ClusterSnapshot }
  | { kind: 'health'; observedAt: string; clusterName: string; services: ServiceHealth[] }
  | { kind: 'deployment'; observedAt: string; check: DeploymentCheck };

export type InfrastructureKind = InfrastructureSubject['kind'];
