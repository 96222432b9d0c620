import { DEFAULT_SHEET_NAME } from './loadTable'

export type Platform = 'windows' | 'mac' | 'linux' | 'other'

export interface AppConfig {
  version: string
  gitCommit: string
  isDev: boolean
  sheetName: string
  labelFont?: string
}

export type EnvSource = Record<string, string | boolean | undefined>

// Fonts with Japanese glyphs per platform
export const LABEL_FONTS: Record<Platform, string> = {
  windows: 'Meiryo',
  mac: 'Hiragino Sans',
  linux: 'Noto Sans CJK JP',
  other: 'sans-serif',
}

function readString(env: EnvSource, key: string): string | undefined {
  const value = env[key]
  return typeof value === 'string' && value.trim() ? value.trim() : undefined
}

export function loadConfig(env: EnvSource): AppConfig {
  const isDev = env.VITE_IS_DEV
  return {
    version: readString(env, 'VITE_APP_VERSION') ?? '0.0.0',
    gitCommit: readString(env, 'VITE_GIT_COMMIT') ?? '',
    isDev: isDev === true || isDev === 'true',
    sheetName: readString(env, 'VITE_SHEET_NAME') ?? DEFAULT_SHEET_NAME,
    labelFont: readString(env, 'VITE_LABEL_FONT'),
  }
}

export function detectPlatform(userAgent: string): Platform {
  if (/Windows/i.test(userAgent)) return 'windows'
  if (/Macintosh|Mac OS X|iPhone|iPad/i.test(userAgent)) return 'mac'
  if (/Linux|X11|Android|CrOS/i.test(userAgent)) return 'linux'
  return 'other'
}

export function resolveLabelFont(platform: Platform, override?: string): string {
  return override ?? LABEL_FONTS[platform]
}

export const config = loadConfig(import.meta.env)
