export interface TextPublisher {
  publish(): string
}
