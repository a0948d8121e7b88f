/**
 * Wake-on-LAN magic packets
 */

import { createSocket } from 'node:dgram'
import { networkInterfaces } from 'node:os'
import type { ComputeNode } from '@coldstart/shared'
import { WakeError } from './errors'
import type { Session } from './remote-session'

export interface WakeSender {
  wake(node: ComputeNode): Promise<void>
}

/**
 * 6 bytes of 0xff followed by the MAC repeated 16 times
 */
export function buildMagicPacket(mac: string): Buffer {
  const bytes = mac.split(/[:-]/).map((part) => parseInt(part, 16))
  if (bytes.length !== 6 || bytes.some((byte) => Number.isNaN(byte) || byte < 0 || byte > 255)) {
    throw new Error(`Malformed MAC address "${mac}"`)
  }

  const packet = Buffer.alloc(6 + 16 * 6, 0xff)
  for (let i = 0; i < 16; i++) {
    Buffer.from(bytes).copy(packet, 6 + i * 6)
  }
  return packet
}

function ipv4ToInt(address: string): number {
  return address.split('.').reduce((acc, octet) => ((acc << 8) | parseInt(octet, 10)) >>> 0, 0)
}

function intToIpv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join('.')
}

/**
 * IPv4 broadcast address of an address/netmask pair
 */
export function broadcastAddress(address: string, netmask: string): string {
  const addr = ipv4ToInt(address)
  const mask = ipv4ToInt(netmask)
  return intToIpv4((addr | ~mask) >>> 0)
}

/**
 * Pull the broadcast address out of `ip -o -4 addr show dev <iface>`
 */
export function parseBroadcastFromIpAddr(output: string): string | null {
  const match = output.match(/\bbrd\s+(\d{1,3}(?:\.\d{1,3}){3})/)
  return match ? match[1] : null
}

/**
 * Sends packets from this host over UDP
 */
export class UdpWakeSender implements WakeSender {
  private broadcast: string | null = null

  constructor(
    private readonly iface: string,
    private readonly port: number
  ) {}

  resolveBroadcast(): string {
    if (this.broadcast) {
      return this.broadcast
    }
    const entry = networkInterfaces()[this.iface]?.find((info) => info.family === 'IPv4')
    if (!entry) {
      throw new WakeError(this.iface, `interface ${this.iface} has no IPv4 address`)
    }
    this.broadcast = broadcastAddress(entry.address, entry.netmask)
    return this.broadcast
  }

  async wake(node: ComputeNode): Promise<void> {
    const broadcast = this.resolveBroadcast()
    const packet = buildMagicPacket(node.mac)
    const socket = createSocket('udp4')

    try {
      await new Promise<void>((resolve, reject) => {
        socket.once('error', reject)
        socket.bind(() => {
          socket.setBroadcast(true)
          socket.send(packet, this.port, broadcast, (error) => (error ? reject(error) : resolve()))
        })
      })
    } catch (error) {
      throw new WakeError(node.name, error instanceof Error ? error.message : String(error))
    } finally {
      socket.close()
    }
  }
}

/**
 * Sends packets from the control host, which sits on the compute network
 */
export class SessionWakeSender implements WakeSender {
  private broadcast: Promise<string> | null = null

  constructor(
    private readonly session: Session,
    private readonly alias: string,
    private readonly iface: string,
    private readonly port: number
  ) {}

  /**
   * Read the interface's broadcast address on the control host, once
   */
  resolveBroadcast(): Promise<string> {
    this.broadcast ??= this.readBroadcast().catch((error: unknown) => {
      this.broadcast = null
      throw error
    })
    return this.broadcast
  }

  async wake(node: ComputeNode): Promise<void> {
    const broadcast = await this.resolveBroadcast()
    const result = await this.session.run(
      this.alias,
      `wakeonlan -i ${broadcast} -p ${this.port} ${node.mac}`,
      { capture: true, sync: false }
    )
    if (result.exitCode !== 0) {
      throw new WakeError(node.name, result.stderr.trim() || `exit code ${result.exitCode}`)
    }
  }

  private async readBroadcast(): Promise<string> {
    const result = await this.session.run(this.alias, `ip -o -4 addr show dev ${this.iface}`, {
      capture: true,
    })
    const broadcast = result.exitCode === 0 ? parseBroadcastFromIpAddr(result.stdout) : null
    if (!broadcast) {
      throw new WakeError(
        this.alias,
        `no broadcast address for ${this.iface}: ${result.stderr.trim() || result.stdout.trim()}`
      )
    }
    return broadcast
  }
}
