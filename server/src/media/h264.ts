export const NalUnitType = {
  NonIdrSlice: 1,
  IdrSlice: 5,
  Sei: 6,
  Sps: 7,
  Pps: 8,
  AccessUnitDelimiter: 9,
  StapA: 24,
  FuA: 28,
} as const;

const START_CODE = Buffer.from([0, 0, 0, 1]);

export function nalUnitType(nal: Uint8Array): number {
  return nal.length > 0 ? nal[0] & 0x1f : 0;
}

/**
 * Splits an Annex-B byte stream into NAL units, start codes and trailing zero
 * bytes removed. Input without any start code is returned as a single NAL.
 */
export function splitAnnexB(payload: Buffer): Buffer[] {
  const starts: Array<{ codeStart: number; nalStart: number }> = [];
  for (let i = 0; i + 2 < payload.length; i += 1) {
    if (payload[i] === 0 && payload[i + 1] === 0 && payload[i + 2] === 1) {
      const codeStart = i > 0 && payload[i - 1] === 0 ? i - 1 : i;
      starts.push({ codeStart, nalStart: i + 3 });
      i += 2;
    }
  }

  if (starts.length === 0) {
    return payload.length > 0 ? [payload] : [];
  }

  const nals: Buffer[] = [];
  starts.forEach((start, index) => {
    let end = index + 1 < starts.length ? starts[index + 1].codeStart : payload.length;
    while (end > start.nalStart && payload[end - 1] === 0) {
      end -= 1;
    }
    if (end > start.nalStart) {
      nals.push(payload.subarray(start.nalStart, end));
    }
  });
  return nals;
}

export function joinAnnexB(nals: readonly Buffer[]): Buffer {
  return Buffer.concat(nals.flatMap((nal) => [START_CODE, nal]));
}

export function containsIdr(nals: readonly Buffer[]): boolean {
  return nals.some((nal) => nalUnitType(nal) === NalUnitType.IdrSlice);
}
