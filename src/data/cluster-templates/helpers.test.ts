import { describe, expect, it } from "vitest"
import { MalformedResponseError } from "src/api/errors"
import { makeClusterTemplate, testLocation } from "src/test/fixtures"
import {
  createClusterTemplateBody,
  normalizeClusterTemplate,
  normalizeClusterTemplates,
} from "./helpers"

const strict = { strictMode: true, location: testLocation }
const lenient = { strictMode: false, location: testLocation }

describe("normalizeClusterTemplate", () => {
  it("renames the boolean flags and keeps the required fields", () => {
    const template = makeClusterTemplate({
      public: true,
      human_id: "k8s-template",
      model_name: "ClusterTemplate",
      master_lb_enabled: true,
    })

    expect(normalizeClusterTemplate(template, strict)).toEqual({
      id: template.uuid,
      location: testLocation,
      is_public: true,
      is_registry_enabled: false,
      is_tls_disabled: false,
      apiserver_port: null,
      cluster_distro: "fedora-coreos",
      coe: "kubernetes",
      created_at: "2026-01-05T10:00:00+00:00",
      dns_nameserver: "8.8.8.8",
      docker_volume_size: 10,
      external_network_id: "public",
      flavor_id: "m1.small",
      image_id: "fedora-coreos",
      insecure_registry: null,
      keypair_id: "dev-key",
      name: "k8s-template",
      network_driver: "flannel",
      server_type: "vm",
      updated_at: null,
      volume_driver: "cinder",
      properties: { master_lb_enabled: true },
    })
  })

  it("copies optional fields only when present", () => {
    const normalized = normalizeClusterTemplate(
      makeClusterTemplate({ labels: { kube_tag: "v1.28.2" }, http_proxy: null }),
      strict
    )

    expect(normalized.labels).toEqual({ kube_tag: "v1.28.2" })
    expect(normalized.http_proxy).toBeNull()
    expect("https_proxy" in normalized).toBe(false)
    expect("fixed_network" in normalized).toBe(false)
  })

  it("emits the legacy names outside strict mode", () => {
    const template = makeClusterTemplate({
      tls_disabled: true,
      floating_ip_enabled: true,
    })
    const normalized = normalizeClusterTemplate(template, lenient)

    expect(normalized).toMatchObject({
      id: template.uuid,
      uuid: template.uuid,
      is_tls_disabled: true,
      tls_disabled: true,
      public: false,
      registry_enabled: false,
      floating_ip_enabled: true,
    })
    expect(normalized.properties).toEqual({})
  })

  it("never exposes floating_ip_enabled in strict mode or properties", () => {
    const normalized = normalizeClusterTemplate(
      makeClusterTemplate({ floating_ip_enabled: true }),
      strict
    )

    expect("floating_ip_enabled" in normalized).toBe(false)
    expect("uuid" in normalized).toBe(false)
    expect("public" in normalized).toBe(false)
    expect(normalized.properties).toEqual({})
  })

  it("skips a null floating_ip_enabled outside strict mode", () => {
    const normalized = normalizeClusterTemplate(
      makeClusterTemplate({ floating_ip_enabled: null }),
      lenient
    )

    expect("floating_ip_enabled" in normalized).toBe(false)
  })

  it.each(["coe", "image_id", "updated_at", "public", "uuid"])(
    "fails when %s is missing",
    (field) => {
      const { [field]: _removed, ...template } = makeClusterTemplate()

      expect(() => normalizeClusterTemplate(template, strict)).toThrow(
        new MalformedResponseError("cluster template", field)
      )
    }
  )

  it("does not modify the caller's record", () => {
    const template = makeClusterTemplate({ labels: { a: "b" } })
    const snapshot = structuredClone(template)

    normalizeClusterTemplate(template, lenient)

    expect(template).toEqual(snapshot)
  })
})

describe("normalizeClusterTemplates", () => {
  it("normalizes each record in order", () => {
    const normalized = normalizeClusterTemplates(
      [
        makeClusterTemplate({ uuid: "t2", name: "second" }),
        makeClusterTemplate({ uuid: "t1", name: "first" }),
      ],
      strict
    )

    expect(normalized.map(({ id, name }) => [id, name])).toEqual([
      ["t2", "second"],
      ["t1", "first"],
    ])
  })
})

describe("createClusterTemplateBody", () => {
  it("maps the creation arguments onto attribute names", () => {
    expect(
      createClusterTemplateBody("k8s", {
        imageId: "fedora-coreos",
        keypairId: "dev-key",
        coe: "kubernetes",
        network_driver: "calico",
      })
    ).toEqual({
      name: "k8s",
      image_id: "fedora-coreos",
      keypair_id: "dev-key",
      coe: "kubernetes",
      network_driver: "calico",
    })
  })

  it("leaves out arguments that were not given", () => {
    expect(createClusterTemplateBody("k8s", {})).toEqual({ name: "k8s" })
  })
})
