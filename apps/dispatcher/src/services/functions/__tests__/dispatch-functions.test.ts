import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest'
import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { v4 as uuid } from 'uuid'
import { InvocationParams } from '@jec-dispatch/types'
import { buildArgv } from '@jec-dispatch/campaign-utils'
import { logger } from '../../../helpers/loggers.js'
import { runTool } from '../../../helpers/runTool.js'
import {
  exitCodeFor,
  invocationLogBaseName,
  runInvocation
} from '../dispatch-functions.js'

vi.mock('../../../helpers/runTool.js', () => ({
  runTool: vi.fn()
}))

const mockedRunTool = vi.mocked(runTool)

const invocation: InvocationParams = {
  index: 3,
  tool: 'lumberjack.py',
  analysis: 'zjet_excalibur',
  channel: 'ee',
  correctionLevel: 'L1L2Res',
  inputType: 'data',
  inputTypeFlag: '--input-type',
  inputFile: '/samples/data18_ee.root',
  tree: 'basiccuts_L1L2Res/ntuple',
  jobs: 20,
  log: true,
  progress: true,
  dumpYaml: false,
  selection: [],
  passThrough: ['--overwrite'],
  tasks: ['Combination_IOV2018'],
  outputFileSuffix: 'Zee_X_L1L2Res'
}

let logDir: string

beforeAll(async () => {
  logDir = path.join(os.tmpdir(), `jec-dispatch-${uuid()}`)
  await fs.ensureDir(logDir)
})

afterAll(async () => {
  await fs.remove(logDir)
})

beforeEach(() => {
  vi.clearAllMocks()
})

describe('exitCodeFor', () => {
  it('passes exit codes through', () => {
    expect(exitCodeFor({ code: 0, signal: null })).toBe(0)
    expect(exitCodeFor({ code: 3, signal: null })).toBe(3)
  })

  it('maps a terminating signal to 128 + signal number', () => {
    expect(exitCodeFor({ code: null, signal: 'SIGTERM' })).toBe(143)
    expect(exitCodeFor({ code: null, signal: 'SIGKILL' })).toBe(137)
  })
})

describe('invocationLogBaseName', () => {
  it('combines index, input type and suffix', () => {
    expect(invocationLogBaseName(invocation)).toBe('03_data_Zee_X_L1L2Res')
  })

  it('replaces characters that do not belong in file names', () => {
    expect(
      invocationLogBaseName({ ...invocation, outputFileSuffix: 'a/b c' })
    ).toBe('03_data_a_b_c')
  })
})

describe('runInvocation', () => {
  it('runs the tool with the built argv and writes its output to log files', async () => {
    mockedRunTool.mockImplementation(async (_command, _args, opts) => {
      opts?.onStdoutLine?.('processing 100 events')
      opts?.onStderrLine?.('Warning in <TFile>')
      return { code: 0, signal: null }
    })
    const runId = uuid()
    const result = await runInvocation(invocation, {
      runId,
      env: { ROOTSYS: '/opt/root' },
      logDir,
      timeoutMs: 1000
    })

    expect(mockedRunTool).toHaveBeenCalledWith(
      'lumberjack.py',
      buildArgv(invocation),
      expect.objectContaining({ env: { ROOTSYS: '/opt/root' }, timeoutMs: 1000 })
    )
    expect(result.exitCode).toBe(0)
    expect(result.argv).toEqual(buildArgv(invocation))
    expect(result.durationMs).toBeGreaterThanOrEqual(0)

    const base = path.join(logDir, runId, '03_data_Zee_X_L1L2Res')
    await expect(fs.readFile(`${base}.log`, 'utf8')).resolves.toBe(
      'processing 100 events\n'
    )
    await expect(fs.readFile(`${base}_error.log`, 'utf8')).resolves.toBe(
      'Warning in <TFile>\n'
    )
  })

  it('reports a non-zero exit code without throwing', async () => {
    mockedRunTool.mockResolvedValue({ code: 3, signal: null })
    const result = await runInvocation(invocation, {
      runId: uuid(),
      env: {},
      logDir
    })
    expect(result.exitCode).toBe(3)
    expect(result.code).toBe(3)
    expect(logger.error).toHaveBeenCalledWith(
      '[3] lumberjack.py exited with code 3 (suffix Zee_X_L1L2Res)'
    )
  })

  it('maps a killed tool to a shell exit status', async () => {
    mockedRunTool.mockResolvedValue({ code: null, signal: 'SIGTERM' })
    const result = await runInvocation(invocation, {
      runId: uuid(),
      env: {},
      logDir
    })
    expect(result.exitCode).toBe(143)
    expect(result.signal).toBe('SIGTERM')
  })

  it('treats a missing tool like a shell does', async () => {
    mockedRunTool.mockRejectedValue(
      Object.assign(new Error('spawn lumberjack.py ENOENT'), { code: 'ENOENT' })
    )
    const result = await runInvocation(invocation, {
      runId: uuid(),
      env: {},
      logDir
    })
    expect(result.exitCode).toBe(127)
    expect(result.code).toBeNull()
  })

  it('rethrows unexpected errors', async () => {
    mockedRunTool.mockRejectedValue(new Error('boom'))
    await expect(
      runInvocation(invocation, { runId: uuid(), env: {}, logDir })
    ).rejects.toThrow('boom')
  })
})
