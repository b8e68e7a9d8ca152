// Server Component shell; the query client renders on the client.
import RagSearch from "@/components/RagSearch";

export default function HomePage() {
  return (
    <div className="app">
      <header className="app-header">
        <h1>RAG Foundations</h1>
        <p>Ask questions about your documents</p>
      </header>
      <RagSearch />
      <footer className="app-footer">
        <p>Embed, search, answer.</p>
      </footer>
    </div>
  );
}
