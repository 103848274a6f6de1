// frontend/src/components/NewsList.tsx
import type { NewsItem } from "../lib/schema";

type Props = {
  items: NewsItem[];
};

export default function NewsList({ items }: Props) {
  if (items.length === 0) return <div className="text-sm text-slate-500">No news.</div>;

  return (
    <ul className="flex flex-col gap-3">
      {items.map((n) => (
        <li key={n.id} className="rounded-xl border border-slate-200 bg-white p-4">
          <div className="flex items-center justify-between text-xs text-slate-500">
            <span className="rounded-full bg-slate-100 px-2 py-0.5">{n.category}</span>
            <time dateTime={n.date}>{n.date}</time>
          </div>
          <h3 className="mt-2 font-semibold text-slate-800">{n.title}</h3>
          <p className="mt-1 text-sm text-slate-600">{n.excerpt}</p>
        </li>
      ))}
    </ul>
  );
}
