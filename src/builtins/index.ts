import type { BuiltinCommand } from '../types'
import { cdCommand } from './cd'
import { exitCommand } from './exit'
import { exportCommand } from './export'
import { modeCommand } from './mode'
import { pwdCommand } from './pwd'

export function createBuiltins(): Map<string, BuiltinCommand> {
  const builtins = new Map<string, BuiltinCommand>()

  builtins.set('cd', cdCommand)
  builtins.set('exit', exitCommand)
  builtins.set('export', exportCommand)
  builtins.set('mode', modeCommand)
  builtins.set('pwd', pwdCommand)

  return builtins
}

export { cdCommand, exitCommand, exportCommand, modeCommand, pwdCommand }
