import { Client } from 'dag-protocol'

export class RecordingClient implements Client {
  numCloses = 0

  close() {
    ++this.numCloses
  }
}
