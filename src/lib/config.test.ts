import { describe, it, expect } from 'vitest'
import { loadConfig, detectPlatform, resolveLabelFont } from './config'

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      version: '0.0.0',
      gitCommit: '',
      isDev: false,
      sheetName: 'Sheet1',
      labelFont: undefined,
    })
  })

  it('reads trimmed overrides', () => {
    const cfg = loadConfig({
      VITE_APP_VERSION: '1.2.0',
      VITE_GIT_COMMIT: 'abc1234',
      VITE_IS_DEV: true,
      VITE_SHEET_NAME: ' Ledger ',
      VITE_LABEL_FONT: 'Yu Gothic',
    })
    expect(cfg).toEqual({
      version: '1.2.0',
      gitCommit: 'abc1234',
      isDev: true,
      sheetName: 'Ledger',
      labelFont: 'Yu Gothic',
    })
  })

  it('ignores blank values', () => {
    expect(loadConfig({ VITE_SHEET_NAME: '   ', VITE_IS_DEV: 'false' }).sheetName).toBe('Sheet1')
    expect(loadConfig({ VITE_IS_DEV: 'false' }).isDev).toBe(false)
  })
})

describe('detectPlatform', () => {
  it('recognises common user agents', () => {
    expect(detectPlatform('Mozilla/5.0 (Windows NT 10.0; Win64; x64)')).toBe('windows')
    expect(detectPlatform('Mozilla/5.0 (Macintosh; Intel Mac OS X 14_5)')).toBe('mac')
    expect(detectPlatform('Mozilla/5.0 (X11; Linux x86_64)')).toBe('linux')
    expect(detectPlatform('curl/8.0')).toBe('other')
  })
})

describe('resolveLabelFont', () => {
  it('picks a platform font unless overridden', () => {
    expect(resolveLabelFont('windows')).toBe('Meiryo')
    expect(resolveLabelFont('mac')).toBe('Hiragino Sans')
    expect(resolveLabelFont('other')).toBe('sans-serif')
    expect(resolveLabelFont('linux', 'IPAGothic')).toBe('IPAGothic')
  })
})
