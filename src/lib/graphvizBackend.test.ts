import { describe, it, expect, vi, afterEach } from 'vitest'
import { createSvgRenderer, RenderBackendError } from './graphvizBackend'
import type { DotEngine } from './graphvizBackend'

const fakeEngine = (svg: string): DotEngine => ({ dot: vi.fn(() => svg) })

describe('createSvgRenderer', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('renders through the loaded engine and loads it once', async () => {
    const engine = fakeEngine('<svg/>')
    const load = vi.fn(async () => engine)
    const render = createSvgRenderer(load)
    expect(await render('digraph {}')).toBe('<svg/>')
    expect(await render('digraph { a }')).toBe('<svg/>')
    expect(load).toHaveBeenCalledTimes(1)
    expect(engine.dot).toHaveBeenLastCalledWith('digraph { a }', 'svg')
  })

  it('reports a load failure and retries on the next call', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const load = vi.fn<() => Promise<DotEngine>>()
      .mockRejectedValueOnce(new Error('wasm blocked'))
      .mockResolvedValueOnce(fakeEngine('<svg id="ok"/>'))
    const render = createSvgRenderer(load)

    const failure = await render('digraph {}').catch((err: unknown) => err)
    expect(failure).toBeInstanceOf(RenderBackendError)
    if (!(failure instanceof RenderBackendError)) return
    expect(failure.message).toBe('Diagram backend could not be loaded')
    expect(failure.detail).toBe('wasm blocked')

    expect(await render('digraph {}')).toBe('<svg id="ok"/>')
    expect(load).toHaveBeenCalledTimes(2)
  })

  it('reports a layout failure', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const engine: DotEngine = {
      dot: () => {
        throw new Error('syntax error in line 1')
      },
    }
    const render = createSvgRenderer(async () => engine)
    await expect(render('digraph {')).rejects.toMatchObject({
      name: 'RenderBackendError',
      message: 'Diagram layout failed',
      detail: 'syntax error in line 1',
    })
  })
})
