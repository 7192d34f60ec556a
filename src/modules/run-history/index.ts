export { RunHistoryRecorder, createRunHistoryRecorder } from './run-history-recorder.js'
