export const bucketConfigKey = (bucket: string) => `kv:${bucket}:config`;
export const bucketRevisionKey = (bucket: string) => `kv:${bucket}:rev`;
export const entryKeyPrefix = (bucket: string) => `kv:${bucket}:e:`;
export const entryKey = (bucket: string, key: string) => `${entryKeyPrefix(bucket)}${key}`;
export const entryPattern = (bucket: string) => `${entryKeyPrefix(bucket)}*`;
