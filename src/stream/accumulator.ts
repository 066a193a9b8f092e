import type { ActionRecord, RepoSourceRecord, SourceRecord } from "./records.js";

export type ScalarField = "threadId" | "queryMessageId" | "answerMessageId" | "threadTitle";

/** Plain copy of everything the accumulator gathered. */
export interface AccumulatorSnapshot {
  text: string;
  actions: ActionRecord[];
  sources: SourceRecord[];
  githubSources: RepoSourceRecord[];
  relatedQuestionsRaw: string;
  relatedQuestions: string[];
  threadId?: string;
  queryMessageId?: string;
  answerMessageId?: string;
  threadTitle?: string;
  reasoning?: string;
  isFinished: boolean;
  error?: string;
}

/**
 * The full backend response, assembled from stream events. Once finished,
 * every mutator is a no-op.
 */
export class Accumulator {
  private textValue = "";
  private readonly actionList: ActionRecord[] = [];
  private sourceList: SourceRecord[] = [];
  private githubSourceList: RepoSourceRecord[] = [];
  private relatedRaw = "";
  private related: string[] = [];
  private readonly scalars: Partial<Record<ScalarField, string>> = {};
  private reasoningValue: string | undefined;
  private finished = false;
  private errorValue: string | undefined;

  get text(): string {
    return this.textValue;
  }

  get actions(): readonly ActionRecord[] {
    return this.actionList;
  }

  get sources(): readonly SourceRecord[] {
    return this.sourceList;
  }

  get githubSources(): readonly RepoSourceRecord[] {
    return this.githubSourceList;
  }

  get relatedQuestionsRaw(): string {
    return this.relatedRaw;
  }

  /** Empty until the stream finalizes. */
  get relatedQuestions(): readonly string[] {
    return this.related;
  }

  get reasoning(): string | undefined {
    return this.reasoningValue;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  get error(): string | undefined {
    return this.errorValue;
  }

  scalar(field: ScalarField): string | undefined {
    return this.scalars[field];
  }

  appendText(data: string): void {
    if (this.finished) return;
    this.textValue += data;
  }

  addAction(action: ActionRecord): void {
    if (this.finished) return;
    this.actionList.push(action);
  }

  replaceSources(sources: SourceRecord[]): void {
    if (this.finished) return;
    this.sourceList = sources;
  }

  replaceGithubSources(sources: RepoSourceRecord[]): void {
    if (this.finished) return;
    this.githubSourceList = sources;
  }

  appendRelatedQuestion(data: string): void {
    if (this.finished) return;
    this.relatedRaw += `\n${data.trim()}`;
  }

  appendReasoning(data: string): void {
    if (this.finished) return;
    this.reasoningValue = (this.reasoningValue ?? "") + data;
  }

  setScalar(field: ScalarField, value: string): void {
    if (this.finished) return;
    this.scalars[field] = value;
  }

  /** Records a terminal error. The accumulator is finished afterwards. */
  fail(message: string): void {
    if (this.finished) return;
    this.errorValue = message;
    this.finished = true;
  }

  /** Normal end of stream: derives the related question list and finishes. */
  finish(): void {
    if (this.finished) return;
    this.related = this.relatedRaw
      .split("\n")
      .map((q) => q.trim())
      .filter((q) => q.length > 0);
    this.finished = true;
  }

  snapshot(): AccumulatorSnapshot {
    return {
      text: this.textValue,
      actions: [...this.actionList],
      sources: [...this.sourceList],
      githubSources: [...this.githubSourceList],
      relatedQuestionsRaw: this.relatedRaw,
      relatedQuestions: [...this.related],
      ...this.scalars,
      reasoning: this.reasoningValue,
      isFinished: this.finished,
      error: this.errorValue,
    };
  }
}
