/**
 * Configuration Schema
 *
 * Schema-based validation for `fleet.config.json` using Zod. Every timeout
 * and path has a default so a minimal file only names the Terraform and
 * Ansible directories, the targets and the playbooks.
 */

import { z } from "zod";

// =============================================================================
// Zod Schemas
// =============================================================================

const hostNamePattern = /^[A-Za-z0-9_.-]+$/;

export const probeSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("tcp"),
    port: z.number().int().min(1).max(65535),
  }),
  z.object({
    type: z.literal("http"),
    port: z.number().int().min(1).max(65535).default(80),
    path: z.string().startsWith("/").default("/"),
    expectStatus: z.number().int().min(100).max(599).optional(),
    /** Substring the response body must contain, e.g. `healthy`. */
    expectBody: z.string().min(1).optional(),
  }),
]);

/**
 * One managed compute role and the infra-tool outputs that carry its address
 */
export const targetDefinitionSchema = z.object({
  role: z.string().min(1),
  name: z.string().regex(hostNamePattern, "must be a valid inventory host name"),
  group: z.string().regex(hostNamePattern, "must be a valid inventory group name"),
  addressOutput: z.string().min(1),
  privateAddressOutput: z.string().min(1).optional(),
  /** Variable name the address is exported under to playbooks. */
  addressVar: z.string().min(1).optional(),
  probe: probeSchema.default({ type: "tcp", port: 22 }),
  credentials: z.array(z.string().min(1)).default([]),
});

export const playbookSchema = z.object({
  file: z.string().min(1),
  /** Inventory group to limit the run to; all targets when omitted. */
  hosts: z.string().regex(hostNamePattern).optional(),
});

export const verifyCheckSchema = z.object({
  name: z.string().min(1),
  role: z.string().min(1),
  probe: probeSchema,
  required: z.boolean().default(true),
  /** Keep retrying for this long before declaring the check failed. */
  waitMs: z.number().int().nonnegative().default(0),
});

export const loggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  file: z.string().min(1).optional(),
  redactPatterns: z.array(z.string()).default([]),
});

export const fleetConfigSchema = z.object({
  project: z.string().regex(/^[a-z0-9-]+$/, "must be lowercase letters, digits and dashes").default("fleet"),
  terraform: z.object({
    dir: z.string().min(1),
    bin: z.string().min(1).default("terraform"),
    varFile: z.string().min(1).optional(),
    backendConfig: z.array(z.string()).default([]),
    upgrade: z.boolean().default(false),
    commandTimeoutMs: z.number().int().positive().default(1_800_000),
  }),
  ansible: z.object({
    dir: z.string().min(1),
    bin: z.string().min(1).default("ansible-playbook"),
    user: z.string().min(1).default("ec2-user"),
    sshCommonArgs: z
      .string()
      .default("-o StrictHostKeyChecking=no -o UserKnownHostsFile=/dev/null -o ConnectTimeout=30"),
    playbooks: z.array(playbookSchema).min(1),
    commandTimeoutMs: z.number().int().positive().default(1_800_000),
  }),
  targets: z.array(targetDefinitionSchema).min(1),
  readiness: z
    .object({
      timeoutMs: z.number().int().positive().default(300_000),
      intervalMs: z.number().int().positive().default(10_000),
      settleMs: z.number().int().nonnegative().default(45_000),
      attemptTimeoutMs: z.number().int().positive().default(5_000),
    })
    .default({}),
  verify: z.array(verifyCheckSchema).default([]),
  credentials: z
    .object({
      sources: z.array(z.enum(["cli", "env", "file", "parameter-store"])).min(1)
        .default(["cli", "env", "file", "parameter-store"]),
      files: z.array(z.string().min(1)).default([".env"]),
      parameterNamespace: z.string().regex(/^\/[A-Za-z0-9_./-]*$/).default("/devops"),
      verifyIdentity: z.boolean().default(true),
      /** Extra catalog keys that must resolve. */
      required: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  storage: z
    .object({
      region: z.string().min(1).optional(),
      bucket: z.string().min(3).max(63).optional(),
      lockTable: z.string().min(3).optional(),
      stateKey: z.string().min(1).optional(),
      ensureOnUp: z.boolean().default(false),
      writeBackendConfig: z.boolean().default(true),
    })
    .default({}),
  state: z
    .object({
      file: z.string().min(1).default(".fleet-bootstrap/state.db"),
    })
    .default({}),
  logging: loggingConfigSchema.default({}),
  sizing: z.record(z.string(), z.string()).default({}),
  environments: z
    .record(
      z.string().regex(/^[A-Za-z0-9_-]+$/),
      z.object({
        sizing: z.record(z.string(), z.string()).default({}),
        varFile: z.string().min(1).optional(),
      }),
    )
    .default({}),
}).superRefine((config, ctx) => {
  const groups = new Set(config.targets.map((t) => t.group));
  config.ansible.playbooks.forEach((playbook, index) => {
    if (playbook.hosts && !groups.has(playbook.hosts)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ansible", "playbooks", index, "hosts"],
        message: `unknown target group "${playbook.hosts}"`,
      });
    }
  });
  const roles = new Set(config.targets.map((t) => t.role));
  config.verify.forEach((check, index) => {
    if (!roles.has(check.role)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["verify", index, "role"],
        message: `unknown target role "${check.role}"`,
      });
    }
  });
  const names = new Set<string>();
  config.targets.forEach((target, index) => {
    if (names.has(target.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["targets", index, "name"],
        message: `duplicate target name "${target.name}"`,
      });
    }
    names.add(target.name);
  });
});

// =============================================================================
// Types
// =============================================================================

export type FleetConfig = z.infer<typeof fleetConfigSchema>;
export type FleetConfigInput = z.input<typeof fleetConfigSchema>;
export type TargetDefinition = z.infer<typeof targetDefinitionSchema>;
export type PlaybookDefinition = z.infer<typeof playbookSchema>;
export type VerifyCheckDefinition = z.infer<typeof verifyCheckSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type ReadinessConfig = FleetConfig["readiness"];
