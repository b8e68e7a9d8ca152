"use client";

type SourceListProps = {
  sources: string[];
};

export default function SourceList({ sources }: SourceListProps) {
  if (sources.length === 0) return null;

  return (
    <div className="sources-section">
      <h3>Sources:</h3>
      <ul className="sources-list" aria-label="Sources">
        {sources.map((source, i) => (
          // labels can repeat when several chunks come from one document
          <li key={`${source}|${i}`} className="source-item">
            {source}
          </li>
        ))}
      </ul>
    </div>
  );
}
