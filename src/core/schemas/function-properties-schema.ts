import { Static, Type } from '@sinclair/typebox';

export const RemoteCodeLocationSchema = Type.Object({
  Bucket: Type.Unknown(),
  Key: Type.Unknown(),
  Version: Type.Optional(Type.Unknown()),
});

export const FunctionPropertiesSchema = Type.Object({
  Runtime: Type.Optional(Type.String()),
  CodeUri: Type.Optional(Type.Union([Type.String(), RemoteCodeLocationSchema])),
});

export type FunctionProperties = Static<typeof FunctionPropertiesSchema>;
