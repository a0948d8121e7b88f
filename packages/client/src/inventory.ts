/**
 * Inventory building and rendering for the playbook runner
 */

import YAML from 'yaml'
import type { ComputeNode, HardwareProfile } from '@coldstart/shared'

/**
 * Ordered copy of the profile's compute nodes
 */
export function buildNodeList(profile: HardwareProfile): ComputeNode[] {
  return profile.computeNodes.map((node) => ({ ...node }))
}

/**
 * Render an Ansible INI inventory.
 * Playbooks run on the control host itself, so it is addressed locally.
 */
export function renderInventory(nodes: ComputeNode[], sshUser: string): string {
  const lines = ['[control]', 'localhost ansible_connection=local', '', '[compute]']
  for (const node of nodes) {
    lines.push(`${node.name} ansible_host=${node.ip}`)
  }
  lines.push('', '[compute:vars]', `ansible_user=${sshUser}`, '')
  return lines.join('\n')
}

/**
 * Render the hardware variables document passed to every playbook
 */
export function renderHardwareVars(profile: HardwareProfile): string {
  return YAML.stringify({
    hardware_version: profile.version,
    control_host: profile.controlHostAlias,
    compute_interface: profile.computeInterface,
    driver_role: profile.driverRole ?? null,
    compute_nodes: profile.computeNodes.map((node) => ({
      name: node.name,
      mac: node.mac,
      ip: node.ip,
    })),
  })
}
