import { err, ok, Result } from "../utils/errorHandling";

export type ConversionDirection = "toBin" | "toCpr";

export type CommandLineOptions = {
  toBin?: boolean;
  toCpr?: boolean;
};

export function parseDirection(cmd?: CommandLineOptions | undefined): Result<ConversionDirection> {
  const toBin = cmd?.toBin === true;
  const toCpr = cmd?.toCpr === true;
  if (toBin && toCpr) {
    return err("Specify only one of --to-bin or --to-cpr");
  }
  if (toBin) {
    return ok("toBin");
  }
  if (toCpr) {
    return ok("toCpr");
  }
  return err("Missing direction: specify --to-bin or --to-cpr");
}
