export * from './daemon';
export * from './core/errors';
export { createContext } from './core/context';
export type { AgentContext } from './core/context';
export { RemoteClient } from './rpc/client';
export { Batch } from './rpc/batch';
export { HttpTransport } from './rpc/httpTransport';
export type { RpcTransport, JsonRpcRequest, JsonRpcResponse } from './rpc/types';
export { Timeline, PendingEvent } from './timeline/timeline';
export { TimelineManager } from './timeline/manager';
export type { StoredEvent, TextEventInput } from './timeline/events';
export { ControlClient } from './client/controlClient';
export { FileSampler, SamplerManager } from './collaborators/fileSampler';
export { DirectorySettingsStore } from './collaborators/settingsStore';
export { IntervalTaskScheduler } from './collaborators/taskScheduler';
export type { ScheduledTask } from './collaborators/taskScheduler';
export { DirectoryFirmwareInstaller } from './collaborators/firmwareInstaller';
export type {
	FirmwareInstaller,
	Sample,
	Sampler,
	SamplerProvider,
	SettingsStore,
	TaskScheduler,
} from './collaborators/types';
