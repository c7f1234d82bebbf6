import { CompareView } from "@/components/CompareView";

export default function ComparePage() {
  return (
    <div>
      <h1 className="mb-4 text-3xl font-bold">Compare Players</h1>
      <CompareView />
    </div>
  );
}
