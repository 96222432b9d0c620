export interface DotEngine {
  dot(source: string, format: 'svg'): string
}

export class RenderBackendError extends Error {
  constructor(message: string, readonly hint: string, readonly detail: string) {
    super(message)
    this.name = 'RenderBackendError'
  }
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Wrap an engine loader so the engine is loaded once and reused. A failed
 * load is forgotten, so the next call retries.
 */
export function createSvgRenderer(load: () => Promise<DotEngine>): (dot: string) => Promise<string> {
  let pending: Promise<DotEngine> | null = null

  return async (dot: string) => {
    if (!pending) {
      pending = load().catch((err: unknown) => {
        pending = null
        throw err
      })
    }
    let engine: DotEngine
    try {
      engine = await pending
    } catch (err) {
      console.error('[Graphviz] Failed loading backend', err)
      throw new RenderBackendError(
        'Diagram backend could not be loaded',
        'The Graphviz WebAssembly module failed to load. Check that the browser allows WebAssembly, then reload the page.',
        errorText(err),
      )
    }
    try {
      return engine.dot(dot, 'svg')
    } catch (err) {
      console.error('[Graphviz] Layout failed', err)
      throw new RenderBackendError(
        'Diagram layout failed',
        'Graphviz rejected the generated diagram source.',
        errorText(err),
      )
    }
  }
}

// Loaded on first use so the wasm bundle stays out of the main chunk
export const renderSvg = createSvgRenderer(async () => {
  const { Graphviz } = await import('@hpcc-js/wasm-graphviz')
  return Graphviz.load()
})
