import type { Upid } from '@/types/tasks';

const HEX = '[0-9A-Fa-f]';

// UPID:node:pid:pstart:taskid:starttime:type:id:authid:
const BACKUP_SERVER_UPID = new RegExp(
  `^UPID:([^:\\s]+):(${HEX}{8}):(${HEX}{8,9}):(${HEX}{8,16}):(${HEX}{8}):([^:\\s]+):([^:\\s]*):([^:\\s]+):$`,
);

// UPID:node:pid:pstart:starttime:type:id:user:
const VE_UPID = new RegExp(
  `^UPID:([^:\\s]+):(${HEX}{8}):(${HEX}{8,9}):(${HEX}{8}):([^:\\s]+):([^:\\s]*):([^:\\s]+):$`,
);

/** Decode `\xHH` escapes used in worker ids. */
export function unescapeWorkerId(id: string): string {
  return id.replace(/\\x([0-9A-Fa-f]{2})/g, (_match, hex: string) =>
    String.fromCharCode(parseInt(hex, 16)),
  );
}

const hex = (value: string) => parseInt(value, 16);

export function parseUpid(upid: string): Upid | null {
  const backup = BACKUP_SERVER_UPID.exec(upid);
  if (backup) {
    const [, node, pid, pstart, taskId, starttime, workerType, workerId, authId] = backup;
    return {
      node,
      pid: hex(pid),
      pstart: hex(pstart),
      taskId: hex(taskId),
      starttime: hex(starttime),
      workerType,
      workerId: workerId ? unescapeWorkerId(workerId) : undefined,
      authId,
    };
  }

  const ve = VE_UPID.exec(upid);
  if (ve) {
    const [, node, pid, pstart, starttime, workerType, workerId, authId] = ve;
    return {
      node,
      pid: hex(pid),
      pstart: hex(pstart),
      starttime: hex(starttime),
      workerType,
      workerId: workerId ? unescapeWorkerId(workerId) : undefined,
      authId,
    };
  }

  return null;
}
