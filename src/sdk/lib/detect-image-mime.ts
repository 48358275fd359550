interface Signature {
  mimeType: string;
  offset: number;
  bytes: readonly number[];
}

const signatures: readonly Signature[] = [
  { mimeType: 'image/jpeg', offset: 0, bytes: [0xff, 0xd8, 0xff] },
  { mimeType: 'image/png', offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { mimeType: 'image/gif', offset: 0, bytes: [0x47, 0x49, 0x46, 0x38] },
  // RIFF....WEBP
  { mimeType: 'image/webp', offset: 8, bytes: [0x57, 0x45, 0x42, 0x50] }
];

const matches = (data: Uint8Array, signature: Signature): boolean => {
  if (data.length < signature.offset + signature.bytes.length) {
    return false;
  }

  return signature.bytes.every((byte, index) => data[signature.offset + index] === byte);
};

const isRiff = (data: Uint8Array): boolean =>
  data.length >= 4 && data[0] === 0x52 && data[1] === 0x49 && data[2] === 0x46 && data[3] === 0x46;

export const detectImageMimeType = (data: Uint8Array): string | null => {
  for (const signature of signatures) {
    if (signature.mimeType === 'image/webp' && !isRiff(data)) {
      continue;
    }

    if (matches(data, signature)) {
      return signature.mimeType;
    }
  }

  return null;
};
