/**
 * Media player infrastructure exports
 */

export { UnixSocketTransport, isReplyLine } from './UnixSocketTransport';
export { PlayerChannel, parseReply } from './PlayerChannel';
export type { PlayerChannelOptions } from './PlayerChannel';
export {
  PlayerSupervisor,
  DEFAULT_SUPERVISOR_LIMITS,
  nodeSupervisorRuntime
} from './PlayerSupervisor';
export type { SupervisorLimits, SupervisorRuntime } from './PlayerSupervisor';
export {
  selectAudioOutput,
  buildPlayerArgs,
  detectAudioEnvironment,
  collectStartupDiagnostics,
  isRaspberryPiCpuInfo,
  audioGroupsFrom
} from './AudioEnvironment';
