/**
 * Hardware profile store
 * Owns the active selection file and the profile documents
 */

import { existsSync, readFileSync, readdirSync, renameSync, writeFileSync, mkdirSync, unlinkSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { isIPv4 } from 'node:net'
import YAML from 'yaml'
import type { ComputeNode, HardwareProfile, ProfileSummary } from '@coldstart/shared'
import { NoActiveProfileError, ProfileInvalidError, ProfileNotFoundError } from './errors'

export const ACTIVE_SELECTION_FILE = 'active-hardware'

const MAC_PATTERN = /^[0-9a-f]{2}([:-])[0-9a-f]{2}(\1[0-9a-f]{2}){4}$/i

/**
 * Normalize a MAC address to lowercase colon form, or null if malformed
 */
export function normalizeMac(mac: string): string | null {
  const trimmed = mac.trim()
  if (!MAC_PATTERN.test(trimmed)) {
    return null
  }
  return trimmed.toLowerCase().replace(/-/g, ':')
}

type Doc = Record<string, unknown>

function isDoc(value: unknown): value is Doc {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requiredString(doc: Doc, key: string, version: string, field: string = key): string {
  const value = doc[key]
  if (typeof value === 'number') {
    return String(value)
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ProfileInvalidError(version, field, 'missing or empty')
  }
  return value.trim()
}

function parseNode(raw: unknown, index: number, version: string): ComputeNode {
  const field = `compute_nodes[${index}]`
  if (!isDoc(raw)) {
    throw new ProfileInvalidError(version, field, 'expected { name, mac, ip }')
  }

  const name = requiredString(raw, 'name', version, `${field}.name`)
  const rawMac = requiredString(raw, 'mac', version, `${field}.mac`)
  const ip = requiredString(raw, 'ip', version, `${field}.ip`)

  const mac = normalizeMac(rawMac)
  if (!mac) {
    throw new ProfileInvalidError(version, `${field}.mac`, `malformed MAC "${rawMac}"`)
  }
  if (!isIPv4(ip)) {
    throw new ProfileInvalidError(version, `${field}.ip`, `malformed IPv4 address "${ip}"`)
  }

  return { name, mac, ip }
}

/**
 * YAML reads an unquoted `version: 1.0` as the number 1, so a number is
 * compared by value against the version being loaded
 */
function declaredVersion(doc: Doc, version: string): string {
  const value = doc.version
  if (typeof value === 'number' && value === Number(version)) {
    return version
  }
  return requiredString(doc, 'version', version)
}

/**
 * Validate a parsed profile document
 */
export function parseProfile(raw: unknown, version: string): HardwareProfile {
  if (!isDoc(raw)) {
    throw new ProfileInvalidError(version, '(root)', 'expected a mapping')
  }

  const declared = declaredVersion(raw, version)
  if (declared !== version) {
    throw new ProfileInvalidError(version, 'version', `document declares "${declared}"`)
  }

  const controlHostAlias = requiredString(raw, 'control_host', version)
  const computeInterface = requiredString(raw, 'compute_interface', version)

  let driverRole: string | null = null
  if (raw.driver_role !== undefined && raw.driver_role !== null) {
    driverRole = requiredString(raw, 'driver_role', version)
  }

  const rawNodes = raw.compute_nodes
  if (!Array.isArray(rawNodes) || rawNodes.length === 0) {
    throw new ProfileInvalidError(version, 'compute_nodes', 'expected a non-empty list')
  }

  const computeNodes = rawNodes.map((node, index) => parseNode(node, index, version))

  const seen = new Set<string>()
  computeNodes.forEach((node, index) => {
    if (seen.has(node.name)) {
      throw new ProfileInvalidError(
        version,
        `compute_nodes[${index}].name`,
        `duplicate node name "${node.name}"`
      )
    }
    seen.add(node.name)
  })

  return {
    version,
    controlHostAlias,
    computeInterface,
    driverRole,
    computeNodes,
  }
}

export class ProfileStore {
  constructor(
    private readonly hardwareDir: string,
    private readonly selectionPath: string
  ) {}

  profilePath(version: string): string {
    return join(this.hardwareDir, `${version}.yaml`)
  }

  /**
   * Select a profile. Nothing is written unless the profile exists and validates.
   */
  setActive(version: string): HardwareProfile {
    const profile = this.loadProfile(version)

    const dir = dirname(this.selectionPath)
    mkdirSync(dir, { recursive: true })
    const tempPath = `${this.selectionPath}.${process.pid}.tmp`
    try {
      writeFileSync(tempPath, `${version}\n`, 'utf-8')
      renameSync(tempPath, this.selectionPath)
    } catch (error) {
      if (existsSync(tempPath)) {
        unlinkSync(tempPath)
      }
      throw error
    }

    return profile
  }

  getActive(): string {
    if (!existsSync(this.selectionPath)) {
      throw new NoActiveProfileError()
    }
    const version = readFileSync(this.selectionPath, 'utf-8').trim()
    if (!version) {
      throw new NoActiveProfileError()
    }
    return version
  }

  loadProfile(version: string): HardwareProfile {
    if (!/^[\w.-]+$/.test(version)) {
      throw new ProfileNotFoundError(version, this.profilePath('<version>'))
    }
    const path = this.profilePath(version)
    if (!existsSync(path)) {
      throw new ProfileNotFoundError(version, path)
    }

    let raw: unknown
    try {
      raw = YAML.parse(readFileSync(path, 'utf-8'))
    } catch (error) {
      throw new ProfileInvalidError(
        version,
        '(document)',
        error instanceof Error ? error.message : String(error)
      )
    }
    return parseProfile(raw, version)
  }

  loadActiveProfile(): HardwareProfile {
    return this.loadProfile(this.getActive())
  }

  /**
   * Available profile versions, sorted, with the active one marked
   */
  listProfiles(): ProfileSummary[] {
    if (!existsSync(this.hardwareDir)) {
      return []
    }

    let active: string | null = null
    try {
      active = this.getActive()
    } catch (error) {
      if (!(error instanceof NoActiveProfileError)) throw error
    }

    return readdirSync(this.hardwareDir)
      .filter((file) => file.endsWith('.yaml'))
      .map((file) => file.slice(0, -'.yaml'.length))
      .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }))
      .map((version) => ({ version, active: version === active }))
  }
}
