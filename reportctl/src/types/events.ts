/** Primary stream events, one JSON object per line. */
export type StartEvent = {
  type: "start";
  hostname?: string;
  started: string;
};

export type ResultEvent = {
  type: "result";
  suite: string;
  name: string;
  /** Checked against the closed outcome set after schema validation. */
  outcome: string;
  duration?: number;
  message?: string;
  test_id?: string;
  timestamp?: string;
  output?: string;
};

export type EndEvent = {
  type: "end";
  finished: string;
};

export type RecordEvent = StartEvent | ResultEvent | EndEvent;

export type EventKind = RecordEvent["type"];
