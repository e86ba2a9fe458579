/**
 * INI inventory rendering for the convergence tool.
 */

import type { ProvisionedTarget } from "../types.js";

export type InventoryOptions = {
  user: string;
  sshKeyPath?: string;
  sshCommonArgs?: string;
};

/**
 * One `[group]` section per target group, in first-seen order, followed by
 * `[all:vars]`.
 */
export function renderInventory(targets: readonly ProvisionedTarget[], options: InventoryOptions): string {
  const groups = new Map<string, ProvisionedTarget[]>();
  for (const target of targets) {
    const members = groups.get(target.group) ?? [];
    members.push(target);
    groups.set(target.group, members);
  }

  const lines: string[] = [];
  for (const [group, members] of groups) {
    lines.push(`[${group}]`);
    for (const target of members) {
      const privateIp = target.privateAddress ? ` private_ip=${target.privateAddress}` : "";
      lines.push(`${target.name} ansible_host=${target.address}${privateIp}`);
    }
    lines.push("");
  }

  lines.push("[all:vars]", `ansible_user=${options.user}`);
  if (options.sshKeyPath) lines.push(`ansible_ssh_private_key_file=${options.sshKeyPath}`);
  if (options.sshCommonArgs) lines.push(`ansible_ssh_common_args=${options.sshCommonArgs}`);

  return lines.join("\n") + "\n";
}
