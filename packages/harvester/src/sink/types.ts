type ResultRecord = {
  group_url: string;
  title: string;
  date: string;
  author: string;
  url: string;
  content: string;
};

interface RecordWriter {
  write(records: readonly ResultRecord[]): Promise<void>;
}

const RESULT_COLUMNS = ['group_url', 'title', 'date', 'author', 'url', 'content'] as const;

export { RESULT_COLUMNS };
export type { RecordWriter, ResultRecord };
