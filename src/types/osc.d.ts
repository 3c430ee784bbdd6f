declare module 'osc' {
  interface OSCArgument {
    type: string;
    value: number | string;
  }

  interface OSCMessage {
    address: string;
    args: OSCArgument[];
  }

  /** Write an OSC message to a Buffer */
  function writeMessage(msg: OSCMessage): Uint8Array;

  /** Read an OSC message from a Buffer */
  function readMessage(data: Buffer | Uint8Array, options?: { metadata?: boolean }): OSCMessage;

  export { OSCArgument, OSCMessage, writeMessage, readMessage };
}
