/**
 * Hardware profile types for Coldstart
 * A profile describes one physical cluster generation
 */

export interface ComputeNode {
  name: string
  mac: string  // lowercase, colon separated
  ip: string
}

export interface HardwareProfile {
  version: string
  controlHostAlias: string  // resolved by the operator's ssh config
  computeInterface: string
  driverRole?: string | null
  computeNodes: ComputeNode[]
}

export interface ProfileSummary {
  version: string
  active: boolean
}
