import path from 'node:path'
import { defineConfig, loadEnv } from 'vite'
import react from '@vitejs/plugin-react'

// https://vite.dev/config/
export default defineConfig(({ mode }) => {
  const envDir = path.resolve(__dirname, 'settings')
  const settingsEnv = loadEnv(mode, envDir, '')
  const localEnv = loadEnv(mode, __dirname, '')
  const env = { ...localEnv, ...settingsEnv }

  const uiHost = env.UI_HOST || '127.0.0.1'
  const uiPort = Number(env.UI_PORT || 5173)
  // The CSV is served as a static asset from here, under /data/
  const dataDir = path.resolve(__dirname, env.DATA_DIR || 'public')

  return {
    envDir,
    publicDir: dataDir,
    plugins: [react()],
    build: {
      outDir: 'dist/site',
    },
    server: {
      host: uiHost,
      port: uiPort,
      strictPort: false,
    },
    preview: {
      host: uiHost,
      port: uiPort,
      strictPort: false,
    },
  }
})
