export interface ElementRef {
  ref: string;
  selector: string;
  text?: string;
}

export type ActionTarget =
  | { kind: "element"; element: ElementRef }
  | { kind: "point"; x: number; y: number; confidence: number; template: string };

export interface PageSnapshot {
  queryElements(selector: string): Promise<ElementRef[]>;
  screenshot(): Promise<Buffer>;
}

export interface BrowserSession extends PageSnapshot {
  navigate(url: string): Promise<void>;
  click(target: ActionTarget): Promise<void>;
  typeText(target: ActionTarget, value: string): Promise<void>;
  uploadFile(target: ActionTarget, filePath: string): Promise<void>;
  close(): Promise<void>;
}

export interface SessionProvider {
  newSession(): Promise<BrowserSession>;
  close(): Promise<void>;
}
