import { InsightDashboard } from '@/components/Insight/InsightDashboard';

export default function Home() {
  return <InsightDashboard />;
}
