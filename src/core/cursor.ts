/** Per room, the timestamp of the newest message handed to the bot. */
export class StreamCursor {
  private readonly rooms = new Map<string, number>();

  advance(roomId: string, timestamp: Date): void {
    const at = timestamp.getTime();
    const previous = this.rooms.get(roomId);
    if (previous === undefined || at > previous) {
      this.rooms.set(roomId, at);
    }
  }

  position(roomId: string): Date | undefined {
    const at = this.rooms.get(roomId);
    return at === undefined ? undefined : new Date(at);
  }

  /** Rooms with delivered messages, oldest position first */
  positions(): Array<{ roomId: string; since: Date }> {
    return [...this.rooms.entries()]
      .sort((a, b) => a[1] - b[1])
      .map(([roomId, at]) => ({ roomId, since: new Date(at) }));
  }
}
