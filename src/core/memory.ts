export type FrameOwner = {
  processId: number;
  /** 1-based ordinal of this page among the owner's pages. */
  pageNumber: number;
};

// null marks a free frame.
export type Frame = FrameOwner | null;

export type PageTable = {
  totalMemory: number;
  pageSize: number;
  frameCount: number;
  frames: Frame[];
};

export type FreeRange = {
  kind: "free";
  start: number;
  end: number;
};

export type OwnedPage = {
  kind: "owned";
  start: number;
  end: number;
  processId: number;
  pageNumber: number;
};

export type OccupancyRecord = FreeRange | OwnedPage;
