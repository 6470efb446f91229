import type { RpcMethod, RpcService } from "./model.js";

const HASH_CONSTANT = 65599;

const encoder = new TextEncoder();

// Polynomial hash over the UTF-8 bytes, seeded with the byte length.
export function calculateId(name: string): number {
  const bytes = encoder.encode(name);
  let hash = bytes.length;
  let coefficient = HASH_CONSTANT;
  for (const byte of bytes) {
    hash = (hash + Math.imul(coefficient, byte)) >>> 0;
    coefficient = Math.imul(coefficient, HASH_CONSTANT) >>> 0;
  }
  return hash;
}

export function formatId(id: number): string {
  return `0x${(id >>> 0).toString(16).padStart(8, "0")}`;
}

export function serviceId(service: RpcService): string {
  return formatId(calculateId(service.protoPath));
}

// Methods hash their bare name; compile-time lookups on the runtime side key on this.
export function methodId(method: RpcMethod): string {
  return formatId(calculateId(method.name));
}
