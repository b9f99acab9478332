// packages/script/src/interop_service.ts
import { arraysEqual, bytesToHex, ConfigurationError, sha256, utf8ToBytes } from '@n3tx/utils';

/** Syscall names with their fixed execution price (in fractions of GAS). */
const SERVICES = [
  ['System.Crypto.CheckSig', 1 << 15],
  ['System.Crypto.CheckMultisig', 0],
  ['System.Contract.Call', 1 << 15],
  ['System.Contract.CallNative', 0],
  ['System.Contract.GetCallFlags', 1 << 10],
  ['System.Contract.CreateStandardAccount', 0],
  ['System.Contract.CreateMultisigAccount', 0],
  ['System.Contract.NativeOnPersist', 0],
  ['System.Contract.NativePostPersist', 0],
  ['System.Iterator.Next', 1 << 15],
  ['System.Iterator.Value', 1 << 4],
  ['System.Runtime.Platform', 1 << 3],
  ['System.Runtime.GetTrigger', 1 << 3],
  ['System.Runtime.GetTime', 1 << 3],
  ['System.Runtime.GetScriptContainer', 1 << 3],
  ['System.Runtime.GetExecutingScriptHash', 1 << 4],
  ['System.Runtime.GetCallingScriptHash', 1 << 4],
  ['System.Runtime.GetEntryScriptHash', 1 << 4],
  ['System.Runtime.CheckWitness', 1 << 10],
  ['System.Runtime.GetInvocationCounter', 1 << 4],
  ['System.Runtime.Log', 1 << 15],
  ['System.Runtime.Notify', 1 << 15],
  ['System.Runtime.GetNotifications', 1 << 12],
  ['System.Runtime.GasLeft', 1 << 4],
  ['System.Runtime.BurnGas', 1 << 4],
  ['System.Runtime.GetNetwork', 1 << 3],
  ['System.Runtime.GetRandom', 1 << 4],
  ['System.Storage.GetContext', 1 << 4],
  ['System.Storage.GetReadOnlyContext', 1 << 4],
  ['System.Storage.AsReadOnly', 1 << 4],
  ['System.Storage.Get', 1 << 15],
  ['System.Storage.Find', 1 << 15],
  ['System.Storage.Put', 1 << 15],
  ['System.Storage.Delete', 1 << 15],
] as const;

export type InteropServiceName = (typeof SERVICES)[number][0];

export type InteropService = {
  name: InteropServiceName;
  /** 4-byte syscall operand: the first four bytes of SHA256(name). */
  hash: Uint8Array;
  price: number;
};

const byName = new Map<InteropServiceName, InteropService>();

for (const [name, price] of SERVICES) {
  byName.set(name, { name, hash: sha256(utf8ToBytes(name)).slice(0, 4), price });
}

export function interopService(name: InteropServiceName): InteropService {
  const svc = byName.get(name);
  if (!svc) throw new ConfigurationError(`unknown interop service ${name}`);
  return svc;
}

export function findInteropService(hash: Uint8Array): InteropService | undefined {
  for (const svc of byName.values()) {
    if (arraysEqual(svc.hash, hash)) return svc;
  }
  return undefined;
}

export function interopHashHex(name: InteropServiceName): string {
  return bytesToHex(interopService(name).hash);
}
