declare module "thirty-two" {
  export function decode(encoded: string | Buffer): Buffer;
}
