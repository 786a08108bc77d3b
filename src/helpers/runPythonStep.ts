import { spawn } from 'node:child_process'
import { once } from 'node:events'
import { config } from '../config/config.js'

export interface RunPythonOptions {
  pythonBin?: string // default: config.pythonBin
  cwd?: string
  env?: NodeJS.ProcessEnv // merged on top of process.env
  timeoutMs?: number
  onStdoutLine?: (line: string) => void
  onStderrLine?: (line: string) => void
  killSignal?: NodeJS.Signals | number // default: 'SIGTERM'
}

export interface PythonStepResult {
  code: number | null
  signal: NodeJS.Signals | null
}

// Feeds complete lines to `onLine`, returns the unterminated remainder.
const splitLines = (buffer: string, onLine?: (line: string) => void): string => {
  let idx
  while ((idx = buffer.indexOf('\n')) !== -1) {
    onLine?.(buffer.slice(0, idx))
    buffer = buffer.slice(idx + 1)
  }
  return buffer
}

export async function runPythonStep(
  scriptPath: string,
  args: readonly string[],
  opts: RunPythonOptions = {}
): Promise<PythonStepResult> {
  const {
    pythonBin = config.pythonBin,
    cwd,
    env,
    timeoutMs,
    onStdoutLine,
    onStderrLine,
    killSignal = 'SIGTERM'
  } = opts

  const child = spawn(pythonBin, [scriptPath, ...args], {
    cwd,
    env: { ...process.env, ...env },
    stdio: ['ignore', 'pipe', 'pipe']
  })

  let stdoutBuf = ''
  let stderrBuf = ''

  child.stdout.setEncoding('utf8')
  child.stderr.setEncoding('utf8')

  child.stdout.on('data', (chunk: string) => {
    stdoutBuf = splitLines(stdoutBuf + chunk, onStdoutLine)
  })
  child.stderr.on('data', (chunk: string) => {
    stderrBuf = splitLines(stderrBuf + chunk, onStderrLine)
  })

  let timeoutHandle: NodeJS.Timeout | undefined
  let killHandle: NodeJS.Timeout | undefined
  if (timeoutMs && timeoutMs > 0) {
    timeoutHandle = setTimeout(() => {
      child.kill(killSignal)
      // escalate if it hangs
      killHandle = setTimeout(() => child.kill('SIGKILL'), 5000)
    }, timeoutMs)
  }

  let exit: [number | null, NodeJS.Signals | null]
  try {
    // 'error' (e.g. missing interpreter) rejects the once() promise
    exit = (await once(child, 'exit')) as [number | null, NodeJS.Signals | null]
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle)
    if (killHandle) clearTimeout(killHandle)
  }
  const [code, signal] = exit

  if (stdoutBuf) onStdoutLine?.(stdoutBuf)
  if (stderrBuf) onStderrLine?.(stderrBuf)

  return { code, signal }
}

export const describeExit = ({ code, signal }: PythonStepResult): string =>
  `exit ${code}${signal ? `, signal ${signal}` : ''}`
