/** Bridge to the host application for side-effecting calls issued by host.invoke nodes. */
export interface WireHostAdapter {
	invokeAction(target: string | undefined, actionId: string, args: unknown[]): unknown;
}
