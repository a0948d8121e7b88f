/**
 * Command handler tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Command } from 'commander'
import type { ComputeNode, Reachability } from '@coldstart/shared'
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createContext, type CommandContext } from '../src/context'
import { NodesUnreachableError } from '../src/errors'
import { invoke } from '../src/commands/invoke'
import { hardwareGet, hardwareList, hardwareSet } from '../src/commands/hardware'
import { controlCmd, controlConfigure, registerControlCommands } from '../src/commands/control'
import {
  computeCmd,
  computeConfigure,
  computeDown,
  computeStatus,
  computeTest,
  computeUp,
  computeWait,
} from '../src/commands/compute'
import { clusterConfigure, clusterStatus, parseStatTime } from '../src/commands/cluster'
import type { ReachabilityChecker } from '../src/reachability'
import { imageClean } from '../src/commands/image'
import { initProject } from '../src/commands/init'
import { createProject, FakeRunner, MemoryLogger, onControl, PROFILE_01, TIMEOUT, toNode } from './helpers'

describe('commands', () => {
  let root: string
  let runner: FakeRunner
  let logger: MemoryLogger

  const context = (remote = true): CommandContext =>
    createContext({ cwd: root, remote }, { runner: runner.run, logger })

  const playbookCalls = () =>
    runner.calls.filter((c) => c.args.some((arg) => arg.includes('ansible-playbook')))

  beforeEach(() => {
    root = createProject({ profiles: { '0.1': PROFILE_01 }, active: '0.1' })
    runner = new FakeRunner()
    logger = new MemoryLogger()
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  describe('createContext', () => {
    it('should fail outside a project', () => {
      const empty = mkdtempSync(join(tmpdir(), 'coldstart-empty-'))
      try {
        expect(() => createContext({ cwd: empty })).toThrow('Run "coldstart init"')
      } finally {
        rmSync(empty, { recursive: true, force: true })
      }
    })
  })

  describe('hardware', () => {
    it('should set and get the active profile', async () => {
      const ctx = context()
      expect(await invoke(ctx, hardwareSet, '0.1')).toBe(0)
      expect(await invoke(ctx, hardwareGet)).toBe(0)

      expect(logger.messages('success')).toEqual([
        'Hardware profile 0.1 selected (2 compute nodes via control)',
      ])
      expect(logger.messages('info')).toEqual(['0.1'])
    })

    it('should fail without touching the selection for a missing profile', async () => {
      const selection = join(root, '.coldstart', 'active-hardware')

      expect(await invoke(context(), hardwareSet, '9.9')).toBe(1)
      expect(readFileSync(selection, 'utf-8')).toBe('0.1\n')
      expect(logger.messages('error')).toEqual([
        `No hardware profile "9.9" (expected ${join(root, 'hardware', '9.9.yaml')})`,
      ])
    })

    it('should fail get when nothing is selected', async () => {
      rmSync(join(root, '.coldstart', 'active-hardware'))

      expect(await invoke(context(), hardwareGet)).toBe(1)
      expect(logger.messages('error')).toEqual([
        'No hardware profile selected. Run "coldstart hardware set <version>" first.',
      ])
    })

    it('should list profiles', async () => {
      expect(await invoke(context(), hardwareList)).toBe(0)
      expect(logger.messages('info')).toEqual(['* 0.1'])
    })
  })

  describe('control', () => {
    it('should mirror the remote exit code', async () => {
      runner.on(onControl('exit 7'), { exitCode: 7 })
      expect(await invoke(context(), controlCmd, ['exit', '7'])).toBe(7)
    })

    it('should run the control playbook limited to the control group', async () => {
      expect(await invoke(context(), controlConfigure)).toBe(0)

      const [call] = playbookCalls()
      expect(call.args[0]).toBe('control')
      expect(call.args[1]).toContain('ansible/control_configure.yml --become --limit control')
    })

    it('should pass dashed words through to the command', async () => {
      const run = async (args: string[]) => {
        const program = new Command().enablePositionalOptions().exitOverride()
        registerControlCommands(program, () => ({ cwd: root, remote: false }))
        await program.parseAsync(['control', 'cmd', ...args], { from: 'user' })
        return process.exitCode
      }

      try {
        expect(await run(['test', '-n', 'word'])).toBe(0)
        expect(await run(['test', '-z', 'word'])).toBe(1)
      } finally {
        process.exitCode = undefined
      }
    })

    it('should run locally in local mode', async () => {
      expect(await invoke(context(false), controlCmd, ['hostname'])).toBe(0)

      expect(runner.calls).toHaveLength(1)
      expect(runner.calls[0].file).toBe('sh')
      expect(runner.calls[0].args).toEqual(['-c', 'hostname'])
      expect(runner.calls[0].options.cwd).toBe(root)
    })
  })

  describe('compute status', () => {
    it('should stay terse when every node is reachable', async () => {
      expect(await invoke(context(), computeStatus)).toBe(0)
      expect(logger.messages('success')).toEqual(['All 2 nodes reachable'])
    })

    it('should enumerate every unreachable node with its diagnostic', async () => {
      runner.on(toNode('192.168.1.101'), TIMEOUT)

      expect(await invoke(context(), computeStatus)).toBe(1)
      expect(logger.messages('error')).toEqual(['1/2 nodes unreachable'])
      expect(logger.messages('detail')).toEqual([
        'node1 (192.168.1.101) - timeout: ssh: connect to host 192.168.1.101 port 22: Connection timed out',
      ])
    })

    it('should probe nodes through the control host', async () => {
      await invoke(context(), computeStatus)

      expect(runner.calls).toHaveLength(2)
      for (const call of runner.calls) {
        expect(call.args).toContain('-J')
        expect(call.args[call.args.length - 1]).toBe('true')
      }
    })
  })

  describe('compute configure', () => {
    it('should abort before the playbook when a node is unreachable', async () => {
      runner.on(toNode('192.168.1.101'), TIMEOUT)

      const error = await computeConfigure(context()).catch((e: unknown) => e)
      expect(error).toBeInstanceOf(NodesUnreachableError)
      expect(error instanceof NodesUnreachableError && error.nodes.map((n) => n.name)).toEqual(['node1'])
      expect(playbookCalls()).toHaveLength(0)
    })

    it('should exit non-zero and name the unreachable set', async () => {
      runner.on(toNode('192.168.1.101'), TIMEOUT)

      expect(await invoke(context(), computeConfigure)).toBe(1)
      expect(logger.messages('error')).toContain('Unreachable nodes: [node1]')
    })

    it('should run the compute playbook once all nodes are reachable', async () => {
      expect(await invoke(context(), computeConfigure)).toBe(0)
      expect(playbookCalls()).toHaveLength(1)
      expect(playbookCalls()[0].args[1]).toContain('--limit compute')
    })
  })

  describe('compute down', () => {
    it('should succeed when the only failure is an already-down node', async () => {
      runner.on(toNode('192.168.1.100'), TIMEOUT)

      expect(await invoke(context(), computeDown)).toBe(0)
      expect(logger.messages('info')).toEqual([
        '  node0 (192.168.1.100): already down',
        '  node1 (192.168.1.101): shutdown acknowledged',
      ])
      expect(logger.messages('success')).toEqual(['Shutdown issued to 2 nodes'])
    })
  })

  describe('compute down through an unreachable control host', () => {
    it('should fail every node instead of counting them as already down', async () => {
      runner.on(toNode('192.168.1.100'), {
        exitCode: 255,
        stderr: 'ssh: connect to host control port 22: Connection refused\n',
      })
      runner.on(toNode('192.168.1.101'), {
        exitCode: 255,
        stderr: 'ssh: connect to host control port 22: Connection refused\n',
      })

      expect(await invoke(context(), computeDown)).toBe(1)
      expect(logger.messages('error')).toEqual([
        'node0 (192.168.1.100): jump: control host control unreachable: ssh: connect to host control port 22: Connection refused',
        'node1 (192.168.1.101): jump: control host control unreachable: ssh: connect to host control port 22: Connection refused',
        'Shutdown failed on 2/2 nodes',
      ])
      expect(logger.messages('success')).toEqual([])
    })

    it('should still count a node the control host cannot reach as already down', async () => {
      runner.on(toNode('192.168.1.101'), {
        exitCode: 255,
        stderr: 'channel 0: open failed: connect failed: Connection refused\nstdio forwarding failed\n',
      })

      expect(await invoke(context(), computeDown)).toBe(0)
      expect(logger.messages('info')).toContain('  node1 (192.168.1.101): already down')
    })
  })

  describe('compute test', () => {
    it('should run the compute test playbook limited to the compute group', async () => {
      expect(await invoke(context(), computeTest)).toBe(0)

      expect(playbookCalls()).toHaveLength(1)
      expect(playbookCalls()[0].args[1]).toContain('ansible/compute_test.yml --become --limit compute')
    })
  })

  describe('compute cmd', () => {
    it('should run on the indexed node and mirror its exit code', async () => {
      runner.on(toNode('192.168.1.101'), { exitCode: 3 })

      expect(await invoke(context(), computeCmd, '1', ['uptime', '-p'])).toBe(3)
      expect(runner.calls).toHaveLength(1)
      const [call] = runner.calls
      expect(call.args.slice(-2)).toEqual(['root@192.168.1.101', 'uptime -p'])
      expect(call.options.stream).toBe(true)
    })

    it('should reject an index outside the profile', async () => {
      expect(await invoke(context(), computeCmd, '2', ['uptime'])).toBe(1)
      expect(await invoke(context(), computeCmd, 'node0', ['uptime'])).toBe(1)

      expect(runner.calls).toHaveLength(0)
      expect(logger.messages('error')).toEqual([
        'Invalid node index "2" (expected 0-1)',
        'Invalid node index "node0" (expected 0-1)',
      ])
    })

    it('should name the connection failure', async () => {
      runner.on(toNode('192.168.1.101'), TIMEOUT)

      expect(await invoke(context(), computeCmd, '1', ['uptime'])).toBe(255)
      expect(logger.messages('error')).toEqual([
        'node1 (192.168.1.101): ssh: connect to host 192.168.1.101 port 22: Connection timed out',
      ])
    })
  })

  describe('compute up', () => {
    it('should send one packet per node from the control host, then poll', async () => {
      runner.on(onControl('ip -o -4 addr'), {
        stdout: '3: enp3s0    inet 192.168.1.1/24 brd 192.168.1.255 scope global enp3s0\n',
      })

      expect(await invoke(context(), computeUp)).toBe(0)

      const wakes = runner.calls
        .map((c) => c.args[c.args.length - 1] ?? '')
        .filter((command) => command.includes('wakeonlan'))
      expect(wakes).toEqual([
        'cd ~/remote/' + root.split('/').pop() + ' && wakeonlan -i 192.168.1.255 -p 9 aa:bb:cc:dd:ee:00',
        'cd ~/remote/' + root.split('/').pop() + ' && wakeonlan -i 192.168.1.255 -p 9 aa:bb:cc:dd:ee:01',
      ])
      expect(logger.messages('info')).toContain('tick 1: 2/2 reachable')
      expect(logger.messages('success')).toEqual(['All 2 nodes reachable after 1 ticks'])
    })

    it('should exit 130 with the partition when cancelled', async () => {
      runner
        .on(onControl('ip -o -4 addr'), { stdout: 'inet 192.168.1.1/24 brd 192.168.1.255 scope global\n' })
        .on(toNode('192.168.1.101'), TIMEOUT)
      const abort = new AbortController()
      const ctx = context()
      const pending = computeUp(ctx, { signal: abort.signal })
      setTimeout(() => abort.abort(), 20)

      expect(await pending).toBe(130)
      expect(logger.messages('info')).toContain('  Reachable: [node0]')
      expect(logger.messages('info')).toContain('  Unreachable: [node1]')
    })
  })

  describe('compute wait', () => {
    it('should give up after the timeout', async () => {
      runner.on(toNode('192.168.1.101'), TIMEOUT)

      expect(await computeWait(context(), { timeout: '0.0025' })).toBe(1)
      expect(logger.messages('error')).toEqual(['Gave up after 3 ticks'])
    })

    it('should reject a malformed timeout', async () => {
      expect(await computeWait(context(), { timeout: 'soon' })).toBe(1)
      expect(runner.calls).toHaveLength(0)
    })
  })

  describe('image clean', () => {
    it('should run the clean playbook when nothing needs tearing down', async () => {
      expect(await invoke(context(), imageClean)).toBe(0)
      expect(playbookCalls()).toHaveLength(1)
      expect(playbookCalls()[0].args[1]).toContain('ansible/image_clean.yml')
    })
  })

  describe('configure', () => {
    // Each node answers the listed states in order, then stays reachable
    const scripted = (states: Record<string, Reachability[]>): ReachabilityChecker => ({
      check: async (node: ComputeNode) => {
        const state = states[node.name]?.shift() ?? 'reachable'
        return { node, state }
      },
    })

    const configureContext = (checker: ReachabilityChecker): CommandContext =>
      createContext({ cwd: root }, { runner: runner.run, logger, reachability: () => checker })

    it('should wait for restarted nodes to go down before waiting for them to return', async () => {
      const checker = scripted({
        node0: ['reachable', 'unreachable', 'reachable'],
        node1: ['unreachable', 'unreachable', 'reachable'],
      })

      expect(await clusterConfigure(configureContext(checker))).toBe(0)
      expect(playbookCalls().map((c) => c.args[1].match(/ansible\/\w+\.yml/)?.[0])).toEqual([
        'ansible/control_configure.yml',
        'ansible/compute_configure.yml',
      ])
      expect(logger.messages('success')).toContain('2 nodes went down for restart')
      expect(logger.messages('success')).toContain('Cluster configuration complete')
    })

    it('should stop when restarted nodes never go down', async () => {
      rmSync(root, { recursive: true, force: true })
      root = createProject({
        profiles: { '0.1': PROFILE_01 },
        active: '0.1',
        config: { power: { poll_interval_ms: 1, settle_timeout_ms: 3 } },
      })

      expect(await clusterConfigure(configureContext(scripted({})))).toBe(1)
      expect(logger.messages('error')).toEqual([
        'Nodes still up after restart: [node0, node1]',
        'Cluster configuration stopped at step 2',
      ])
      expect(playbookCalls()).toHaveLength(1)
    })
  })

  describe('status', () => {
    it('should report control and compute state with last configured times', async () => {
      runner
        .on(onControl('stat -c %y .last_configured_control'), {
          stdout: '2025-09-16 21:45:52.000000000 -0400\n',
        })
        .on(
          (c) => toNode('192.168.1.100')(c) && c.args[c.args.length - 1].startsWith('stat'),
          {
            exitCode: 1,
            stderr: "stat: cannot statx '/etc/last_configured_compute': No such file or directory\n",
          }
        )
        .on(toNode('192.168.1.101'), TIMEOUT)

      expect(await invoke(context(), clusterStatus)).toBe(1)
      expect(logger.messages('info')).toEqual([
        '',
        'Control host (control):',
        '  Status: UP',
        '  Last configured: 2025-09-16 21:45:52',
        '',
        'Compute nodes:',
        '  node0 (192.168.1.100): UP',
        '    Last configured: never',
        '  node1 (192.168.1.101): DOWN',
        '',
      ])
    })

    it('should parse stat output', () => {
      expect(parseStatTime('2025-09-16 21:45:52.000000000 -0400\n')).toBe('2025-09-16 21:45:52')
      expect(parseStatTime('garbage')).toBeNull()
    })
  })
})

describe('initProject', () => {
  it('should scaffold the project once', () => {
    const root = mkdtempSync(join(tmpdir(), 'coldstart-init-'))
    const logger = new MemoryLogger()
    try {
      expect(initProject(root, { user: 'admin' }, logger)).toBe(0)
      expect(readFileSync(join(root, '.coldstart', 'config.yaml'), 'utf-8')).toContain('user: admin')
      expect(readFileSync(join(root, '.coldstart', '.gitignore'), 'utf-8')).toContain('active-hardware')
      expect(existsSync(join(root, 'hardware'))).toBe(true)

      expect(initProject(root, {}, logger)).toBe(1)
    } finally {
      rmSync(root, { recursive: true, force: true })
    }
  })
})
