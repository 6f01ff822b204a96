export type NoteEdit = {
  fullPath: string;
  manualNotes: string;
};
