import type { CloudConfig, Location } from "app-config"
import type { ClusterTemplate } from "src/data/cluster-templates/model"
import type { CoeCluster } from "src/data/coe-clusters/model"
import type { MagnumService } from "src/data/magnum-services/model"

export const testLocation: Location = {
  cloud: "test-cloud",
  region_name: "region-one",
  zone: null,
  project: {
    id: "project-1",
    name: "demo",
    domain_id: "default",
    domain_name: null,
  },
}

export const testConfig: CloudConfig = {
  containerInfraEndpoint: "https://magnum.test:9511/v1",
  authToken: "test-token",
  apiVersion: "latest",
  timeout: 5000,
  strictMode: false,
  location: testLocation,
}

export const makeCluster = (overrides: Partial<CoeCluster> = {}): CoeCluster => ({
  uuid: "c1a2b3c4-0000-4000-8000-000000000001",
  name: "k8s-dev",
  status: "CREATE_COMPLETE",
  cluster_template_id: "t1a2b3c4-0000-4000-8000-000000000001",
  stack_id: "stack-1",
  keypair: "dev-key",
  master_count: 1,
  node_count: 3,
  create_timeout: 60,
  links: [{ href: "https://magnum.test:9511/v1/clusters/c1", rel: "self" }],
  ...overrides,
})

export const makeClusterTemplate = (
  overrides: Partial<ClusterTemplate> = {}
): ClusterTemplate => ({
  uuid: "t1a2b3c4-0000-4000-8000-000000000001",
  name: "k8s-template",
  coe: "kubernetes",
  image_id: "fedora-coreos",
  keypair_id: "dev-key",
  flavor_id: "m1.small",
  external_network_id: "public",
  dns_nameserver: "8.8.8.8",
  docker_volume_size: 10,
  network_driver: "flannel",
  volume_driver: "cinder",
  server_type: "vm",
  cluster_distro: "fedora-coreos",
  apiserver_port: null,
  insecure_registry: null,
  public: false,
  registry_enabled: false,
  tls_disabled: false,
  created_at: "2026-01-05T10:00:00+00:00",
  updated_at: null,
  links: [{ href: "https://magnum.test:9511/v1/clustertemplates/t1", rel: "self" }],
  ...overrides,
})

export const makeMagnumService = (
  overrides: Partial<MagnumService> = {}
): MagnumService => ({
  id: 1,
  binary: "magnum-conductor",
  host: "controller-1",
  state: "up",
  disabled: false,
  disabled_reason: null,
  report_count: 42,
  created_at: "2026-01-05T10:00:00+00:00",
  updated_at: "2026-01-05T11:00:00+00:00",
  ...overrides,
})
