import { afterEach, describe, expect, it, vi } from 'vitest'
import { build } from '../../helpers/app.js'

describe('configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('should default the grace delay past both shutdown phases', async (t) => {
    const app = await build(t)

    expect(app.config.closeGraceDelay).toBe(20000)
    expect(app.config.closeGraceDelay).toBeGreaterThan(
      app.config.pollShutdownTimeoutMs + app.config.dispatchDrainTimeoutMs,
    )
  })

  it('should reject a grace delay that cuts the dispatch drain short', async () => {
    vi.stubEnv('closeGraceDelay', '10000')

    await expect(build()).rejects.toThrow(
      'closeGraceDelay must exceed pollShutdownTimeoutMs + dispatchDrainTimeoutMs (15000)',
    )
  })

  it('should accept a grace delay longer than both shutdown phases', async (t) => {
    vi.stubEnv('closeGraceDelay', '12000')
    vi.stubEnv('pollShutdownTimeoutMs', '5000')
    vi.stubEnv('dispatchDrainTimeoutMs', '5000')

    const app = await build(t)

    expect(app.config.closeGraceDelay).toBe(12000)
  })
})
