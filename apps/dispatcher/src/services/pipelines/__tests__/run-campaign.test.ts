import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest'
import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { parse as parseYaml } from 'yaml'
import { v4 as uuid } from 'uuid'
import {
  Campaign,
  InvocationParams,
  InvocationResult
} from '@jec-dispatch/types'
import { buildArgv, loadCampaign } from '@jec-dispatch/campaign-utils'
import { config } from '../../../config/config.js'
import {
  loadRuntimeEnvironment,
  RuntimeEnvironmentError
} from '../../../helpers/runtimeEnv.js'
import { runInvocation } from '../../functions/dispatch-functions.js'
import { runCampaign } from '../run-campaign.js'

vi.mock('../../../helpers/runtimeEnv.js', async (importOriginal) => {
  const actual =
    await importOriginal<typeof import('../../../helpers/runtimeEnv.js')>()
  return { ...actual, loadRuntimeEnvironment: vi.fn() }
})

vi.mock('../../functions/dispatch-functions.js', () => ({
  runInvocation: vi.fn()
}))

const mockedLoadEnv = vi.mocked(loadRuntimeEnvironment)
const mockedRunInvocation = vi.mocked(runInvocation)

const resultFor = (
  invocation: InvocationParams,
  exitCode: number
): InvocationResult => ({
  invocation,
  argv: buildArgv(invocation),
  code: exitCode,
  signal: null,
  exitCode,
  startedAt: new Date(0),
  completedAt: new Date(5),
  durationMs: 5
})

// Exit codes per invocation index, 0 when not listed
const exitCodes = (codes: number[]) => {
  mockedRunInvocation.mockImplementation(async (invocation) =>
    resultFor(invocation, codes[invocation.index - 1] ?? 0)
  )
}

let campaign: Campaign
let tempDir: string

beforeAll(async () => {
  campaign = await loadCampaign(
    path.join(config.campaignDir, 'zjet-extrapolation-autumn18.yaml')
  )
  tempDir = path.join(os.tmpdir(), `jec-dispatch-${uuid()}`)
  await fs.ensureDir(tempDir)
})

afterAll(async () => {
  await fs.remove(tempDir)
})

beforeEach(() => {
  vi.clearAllMocks()
  mockedLoadEnv.mockResolvedValue({ ROOTSYS: '/opt/root' })
})

describe('runCampaign', () => {
  it('prints the command lines of a dry run without running anything', async () => {
    const lines: string[] = []
    const summary = await runCampaign(campaign, {
      dryRun: true,
      sampleDir: '/samples',
      passThrough: ['--overwrite'],
      print: (line) => lines.push(line)
    })

    expect(lines).toHaveLength(6)
    expect(lines[0]).toBe(
      'lumberjack.py -a zjet_excalibur -i /samples/mc18_mm_DYJets_Madgraph_JECv16_2019-07-18.root --selection zpt alpha --tree basiccuts_L1L2L3/ntuple --input-type mc -j15 --log --progress --dump-yaml --overwrite task Extrapolation_RunMC_EtaBins_ZPtBins --output-file-suffix Zmm_Autumn18_17Sep2018_L1L2L3'
    )
    expect(lines[5]).toBe(
      'lumberjack.py -a zjet_excalibur -i /samples/data18_ee_ABCD_JECv16_2019-07-18.root --selection zpt alpha --tree basiccuts_L1L2Res/ntuple --input-type data -j15 --log --progress --dump-yaml --overwrite task Extrapolation_IOV2018_EtaBins_ZPtBins --output-file-suffix Zee_Autumn18_17Sep2018_L1L2Res'
    )
    expect(mockedLoadEnv).not.toHaveBeenCalled()
    expect(mockedRunInvocation).not.toHaveBeenCalled()
    expect(summary.exitCode).toBe(0)
    expect(summary.dryRun).toBe(true)
    expect(summary.results).toEqual([])
    expect(summary.invocations).toHaveLength(6)
  })

  it('runs every invocation in order with the runtime environment', async () => {
    exitCodes([])
    const summary = await runCampaign(campaign, { sampleDir: '/samples' })

    expect(mockedLoadEnv).toHaveBeenCalledWith(campaign.environment, {
      skip: undefined
    })
    expect(mockedRunInvocation).toHaveBeenCalledTimes(6)
    expect(mockedRunInvocation.mock.calls.map(([inv]) => inv.index)).toEqual([
      1, 2, 3, 4, 5, 6
    ])
    for (const [, ctx] of mockedRunInvocation.mock.calls) {
      expect(ctx.env).toEqual({ ROOTSYS: '/opt/root' })
      expect(ctx.runId).toBe(summary.runId)
    }
    expect(summary.exitCode).toBe(0)
  })

  it('keeps going after a failure and reports the last exit code', async () => {
    exitCodes([0, 2, 0, 0, 0, 5])
    const summary = await runCampaign(campaign, { sampleDir: '/samples' })
    expect(summary.results).toHaveLength(6)
    expect(summary.exitCode).toBe(5)
  })

  it('ends with exit code 0 when only an earlier invocation failed', async () => {
    exitCodes([0, 2])
    const summary = await runCampaign(campaign, { sampleDir: '/samples' })
    expect(summary.results).toHaveLength(6)
    expect(summary.exitCode).toBe(0)
  })

  it('halts at the first failure with the halt policy', async () => {
    exitCodes([0, 2])
    const summary = await runCampaign(campaign, {
      sampleDir: '/samples',
      failurePolicy: 'halt'
    })
    expect(mockedRunInvocation).toHaveBeenCalledTimes(2)
    expect(summary.results.map((r) => r.exitCode)).toEqual([0, 2])
    expect(summary.exitCode).toBe(2)
  })

  it('forwards pass-through arguments to every invocation', async () => {
    exitCodes([])
    await runCampaign(campaign, {
      sampleDir: '/samples',
      passThrough: ['--overwrite', '--nevents', '10']
    })
    for (const [inv] of mockedRunInvocation.mock.calls) {
      expect(inv.passThrough).toEqual(['--overwrite', '--nevents', '10'])
    }
  })

  it('does not run anything when the runtime environment is missing', async () => {
    mockedLoadEnv.mockRejectedValue(
      new RuntimeEnvironmentError('Analysis runtime setup script not found: with_root_df')
    )
    await expect(
      runCampaign(campaign, { sampleDir: '/samples' })
    ).rejects.toBeInstanceOf(RuntimeEnvironmentError)
    expect(mockedRunInvocation).not.toHaveBeenCalled()
  })

  it('writes a YAML report covering invocations that never ran', async () => {
    exitCodes([0, 2])
    const reportFile = path.join(tempDir, 'reports', 'halted.yaml')
    const summary = await runCampaign(campaign, {
      sampleDir: '/samples',
      failurePolicy: 'halt',
      reportFile
    })

    const report = parseYaml(await fs.readFile(reportFile, 'utf8'))
    expect(report.runId).toBe(summary.runId)
    expect(report.campaign).toBe('zjet-extrapolation-autumn18')
    expect(report.failurePolicy).toBe('halt')
    expect(report.exitCode).toBe(2)
    expect(report.invocations).toHaveLength(6)
    expect(report.invocations[1]).toEqual({
      index: 2,
      channel: 'mm',
      inputType: 'data',
      correctionLevel: 'L1L2L3',
      outputFileSuffix: 'Zmm_Autumn18_17Sep2018_L1L2L3',
      command:
        'lumberjack.py -a zjet_excalibur -i /samples/data18_mm_ABCD_JECv16_2019-07-18.root --selection zpt alpha --tree basiccuts_L1L2L3/ntuple --input-type data -j15 --log --progress --dump-yaml task Extrapolation_IOV2018_EtaBins_ZPtBins --output-file-suffix Zmm_Autumn18_17Sep2018_L1L2L3',
      status: 'failed',
      exitCode: 2,
      signal: null,
      durationMs: 5
    })
    expect(report.invocations.map((i: { status: string }) => i.status)).toEqual([
      'success',
      'failed',
      'not run',
      'not run',
      'not run',
      'not run'
    ])
  })
})
