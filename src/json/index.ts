// src/json/index.ts
export { updateJson, setJsonKey, toWireString, toBytesWithWrapString } from './update.ts';
export { scanObject, findMember } from './scanner.ts';
export type { ObjectLayout, MemberSpan } from './scanner.ts';
