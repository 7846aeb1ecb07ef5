import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";
import { Cursor, cursorFromString, emptyCursor } from "../dto/envelopes";
import { errorMessage } from "../errors";

/**
 * Turns the `cursor` query string into the id to page before.
 */
@Injectable()
export class ParseCursorPipe
	implements PipeTransform<string | undefined, Cursor>
{
	transform(value: string | undefined): Cursor {
		if (!value) {
			return emptyCursor;
		}
		try {
			return cursorFromString(value);
		} catch (err) {
			throw new BadRequestException(errorMessage(err));
		}
	}
}
