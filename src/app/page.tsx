import type { DashboardMetrics } from "@/lib/analytics/types";
import { AnalyticsService } from "@/lib/analytics/service";
import { getDb } from "@/lib/db/client";
import { createSyllabusResultStore } from "@/lib/syllabus/factory";
import type { SyllabusResult } from "@/lib/syllabus/schemas";
import Alert from "@mui/material/Alert";
import Box from "@mui/material/Box";
import Paper from "@mui/material/Paper";
import Table from "@mui/material/Table";
import TableBody from "@mui/material/TableBody";
import TableCell from "@mui/material/TableCell";
import TableContainer from "@mui/material/TableContainer";
import TableHead from "@mui/material/TableHead";
import TableRow from "@mui/material/TableRow";
import Typography from "@mui/material/Typography";

export const dynamic = "force-dynamic";

interface LectureRow {
	classId: number;
	date: string | null;
	words: number | null;
	questions: number | null;
	topics: number;
	subtopics: number;
	mainIdeas: number;
	hasTakeaway: boolean;
}

/** Join the per-lecture metric lists on class id, in timeline order. */
function toRows(metrics: DashboardMetrics): LectureRow[] {
	const byId = <T extends { class_id: number }>(items: T[]) =>
		new Map(items.map((item) => [item.class_id, item]));
	const questions = byId(metrics.questions_per_class);
	const topics = byId(metrics.topics_overview);
	const words = byId(metrics.transcript_length);
	const summaries = byId(metrics.summary_metrics);

	return metrics.lecture_timeline.map(({ class_id, date }) => ({
		classId: class_id,
		date,
		words: words.get(class_id)?.word_count ?? null,
		questions: questions.get(class_id)?.questions ?? null,
		topics: topics.get(class_id)?.topics ?? 0,
		subtopics: topics.get(class_id)?.subtopics ?? 0,
		mainIdeas: summaries.get(class_id)?.main_ideas_count ?? 0,
		hasTakeaway: summaries.get(class_id)?.has_takeaway ?? false,
	}));
}

function dash(value: string | number | null): string {
	return value === null ? "–" : String(value);
}

export default async function Home() {
	let metrics: DashboardMetrics | null = null;
	let syllabus: { filename: string; data: SyllabusResult } | null = null;
	let loadError = false;

	try {
		metrics = new AnalyticsService(getDb()).getDashboardMetrics();
		syllabus = await createSyllabusResultStore().latest();
	} catch (error) {
		console.error("Failed to load dashboard data:", error);
		loadError = true;
	}

	const rows = metrics ? toRows(metrics) : [];
	const coverage = syllabus?.data.coverage_stats;

	return (
		<Box component="main" sx={{ maxWidth: 1080, mx: "auto", p: 3 }}>
			<Typography variant="h3" component="h1" gutterBottom>
				Lecture Analytics
			</Typography>
			<Typography variant="subtitle1" color="text.secondary" gutterBottom>
				Class recordings, summaries and syllabus coverage
			</Typography>

			{loadError && (
				<Alert severity="warning" data-testid="dashboard-error-fallback" sx={{ mt: 3 }}>
					Dashboard data could not be loaded.
				</Alert>
			)}

			{metrics && (
				<>
					<Typography variant="h5" sx={{ mt: 4, mb: 1 }}>
						Lectures
					</Typography>
					<Typography color="text.secondary" sx={{ mb: 1 }}>
						{metrics.syllabus_coverage.lectures_count} processed,{" "}
						{metrics.syllabus_coverage.unique_topics_covered} unique topics (
						{metrics.syllabus_coverage.avg_topics_per_class} per class)
					</Typography>
					{rows.length === 0 ? (
						<Alert severity="info" data-testid="no-lectures">
							No processed lectures yet.
						</Alert>
					) : (
						<TableContainer component={Paper} data-testid="lecture-metrics-table">
							<Table size="small">
								<TableHead>
									<TableRow>
										<TableCell sx={{ fontWeight: 600 }}>Class</TableCell>
										<TableCell sx={{ fontWeight: 600 }}>Date</TableCell>
										<TableCell sx={{ fontWeight: 600 }}>Words</TableCell>
										<TableCell sx={{ fontWeight: 600 }}>Questions</TableCell>
										<TableCell sx={{ fontWeight: 600 }}>Topics</TableCell>
										<TableCell sx={{ fontWeight: 600 }}>Subtopics</TableCell>
										<TableCell sx={{ fontWeight: 600 }}>Main ideas</TableCell>
										<TableCell sx={{ fontWeight: 600 }}>Takeaway</TableCell>
									</TableRow>
								</TableHead>
								<TableBody>
									{rows.map((row) => (
										<TableRow key={row.classId}>
											<TableCell>{row.classId}</TableCell>
											<TableCell>{dash(row.date)}</TableCell>
											<TableCell>{dash(row.words)}</TableCell>
											<TableCell>{dash(row.questions)}</TableCell>
											<TableCell>{row.topics}</TableCell>
											<TableCell>{row.subtopics}</TableCell>
											<TableCell>{row.mainIdeas}</TableCell>
											<TableCell>{row.hasTakeaway ? "Yes" : "–"}</TableCell>
										</TableRow>
									))}
								</TableBody>
							</Table>
						</TableContainer>
					)}
				</>
			)}

			<Typography variant="h5" sx={{ mt: 4, mb: 1 }}>
				Syllabus coverage
			</Typography>
			{!syllabus || !coverage ? (
				<Typography color="text.secondary">No syllabus uploaded yet.</Typography>
			) : (
				<TableContainer component={Paper} data-testid="syllabus-coverage-table">
					<Table size="small">
						<TableBody>
							<TableRow>
								<TableCell component="th" sx={{ fontWeight: 600, width: "30%" }}>
									Result
								</TableCell>
								<TableCell>{syllabus.filename}</TableCell>
							</TableRow>
							<TableRow>
								<TableCell component="th" sx={{ fontWeight: 600 }}>
									Coverage
								</TableCell>
								<TableCell>
									{coverage.coverage_percentage}% ({coverage.covered_topics} of {coverage.total_topics})
								</TableCell>
							</TableRow>
							<TableRow>
								<TableCell component="th" sx={{ fontWeight: 600 }}>
									Not yet covered
								</TableCell>
								<TableCell sx={{ wordBreak: "break-word" }}>
									{coverage.missing_topics.length > 0 ? coverage.missing_topics.join(", ") : "–"}
								</TableCell>
							</TableRow>
						</TableBody>
					</Table>
				</TableContainer>
			)}
		</Box>
	);
}
