const ONE_KHZ = 1_000;
const ONE_MHZ = 1_000_000;
const ONE_GHZ = 1_000_000_000;

/** At most one decimal place, trailing `.0` dropped (10.0 → "10", 10.12 → "10.1"). */
function formatDecimal(value: number): string {
  const fixed = value.toFixed(1);
  return fixed.endsWith('.0') ? fixed.slice(0, -2) : fixed;
}

/** Hz → "433 Hz" / "87.5 KHz" / "433.1 MHz" / "1.7 GHz". Empty for missing or negative values. */
export function formatFrequency(hz: number | null | undefined): string {
  if (hz === null || hz === undefined || Number.isNaN(hz)) return '';
  const n = Math.trunc(hz);
  if (n < 0) return '';
  if (n < ONE_KHZ) return `${n} Hz`;
  if (n < ONE_MHZ) return `${formatDecimal(hz / ONE_KHZ)} KHz`;
  if (n < ONE_GHZ) return `${formatDecimal(hz / ONE_MHZ)} MHz`;
  return `${formatDecimal(hz / ONE_GHZ)} GHz`;
}

export function formatPower(dbm: number | null | undefined): string {
  if (dbm === null || dbm === undefined || Number.isNaN(dbm)) return '';
  return dbm.toFixed(2);
}
